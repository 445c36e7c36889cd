import type {
  ActuatorSpec,
  BushingSpec,
  CollisionSpec,
  FrameSpec,
  JointSpec,
  LinkSpec,
  VisualSpec,
} from "../urdf/urdfModel";

export type ModelInstanceIndex = number;
export type BodyIndex = number;
export type FrameIndex = number;
export type JointIndex = number;
export type ActuatorIndex = number;
export type ForceElementIndex = number;
export type GeometryId = number;

export const WORLD_MODEL_INSTANCE: ModelInstanceIndex = 0;
export const DEFAULT_MODEL_INSTANCE: ModelInstanceIndex = 1;
export const WORLD_BODY: BodyIndex = 0;
export const WORLD_FRAME: FrameIndex = 0;

export type GeometryRegistration =
  | { role: "visual"; visual: VisualSpec }
  | { role: "collision"; collision: CollisionSpec };

export type JointBodies = { parent: BodyIndex; child: BodyIndex };

export type BushingFrames = { frameA: FrameIndex; frameC: FrameIndex };

/**
 * Receives the specs the parser commits. Implementations own the kinematic
 * tree; the parser only ever adds to it and never reads back beyond the
 * handles it was given.
 */
export interface ModelBuilder {
  hasModelInstanceNamed(name: string): boolean;
  addModelInstance(name: string): ModelInstanceIndex;
  addRigidBody(instance: ModelInstanceIndex, link: LinkSpec): BodyIndex;
  /** The frame fixed to `body` at its origin; bushings may reference it by link name. */
  bodyFrame(body: BodyIndex): FrameIndex;
  registerGeometry(body: BodyIndex, geometry: GeometryRegistration): GeometryId;
  addFrame(instance: ModelInstanceIndex, frame: FrameSpec, body: BodyIndex): FrameIndex;
  addJoint(instance: ModelInstanceIndex, joint: JointSpec, bodies: JointBodies): JointIndex;
  addJointActuator(instance: ModelInstanceIndex, actuator: ActuatorSpec, joint: JointIndex): ActuatorIndex;
  addLinearBushing(instance: ModelInstanceIndex, bushing: BushingSpec, frames: BushingFrames): ForceElementIndex;
  excludeCollisionsBetween(bodyA: BodyIndex, bodyB: BodyIndex): void;
}
