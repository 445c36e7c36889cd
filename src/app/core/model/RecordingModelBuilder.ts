import type { ActuatorSpec, BushingSpec, FrameSpec, JointSpec, LinkSpec } from "../urdf/urdfModel";
import {
  DEFAULT_MODEL_INSTANCE,
  WORLD_BODY,
  WORLD_FRAME,
  WORLD_MODEL_INSTANCE,
  type ActuatorIndex,
  type BodyIndex,
  type BushingFrames,
  type ForceElementIndex,
  type FrameIndex,
  type GeometryId,
  type GeometryRegistration,
  type JointBodies,
  type JointIndex,
  type ModelBuilder,
  type ModelInstanceIndex,
} from "./types";

export type InstanceRecord = { index: ModelInstanceIndex; name: string };
export type BodyRecord = {
  index: BodyIndex;
  instance: ModelInstanceIndex;
  name: string;
  link: LinkSpec | null;
  frame: FrameIndex;
};
export type FrameRecord = {
  index: FrameIndex;
  instance: ModelInstanceIndex;
  name: string;
  body: BodyIndex;
  spec: FrameSpec | null;
};
export type JointRecord = { index: JointIndex; instance: ModelInstanceIndex; spec: JointSpec; bodies: JointBodies };
export type ActuatorRecord = {
  index: ActuatorIndex;
  instance: ModelInstanceIndex;
  spec: ActuatorSpec;
  joint: JointIndex;
};
export type ForceElementRecord = {
  index: ForceElementIndex;
  instance: ModelInstanceIndex;
  kind: "linear_bushing_rpy";
  spec: BushingSpec;
  frames: BushingFrames;
};
export type GeometryRecord = { id: GeometryId; body: BodyIndex; registration: GeometryRegistration };

const pairKey = (a: BodyIndex, b: BodyIndex) => (a < b ? `${a}:${b}` : `${b}:${a}`);

/**
 * In-memory ModelBuilder that keeps every committed spec and answers lookups.
 * Index 0 is the world instance/body/frame and instance 1 is the default
 * instance, so the first added model gets instance 2.
 */
export class RecordingModelBuilder implements ModelBuilder {
  private instances: InstanceRecord[] = [
    { index: WORLD_MODEL_INSTANCE, name: "WorldModelInstance" },
    { index: DEFAULT_MODEL_INSTANCE, name: "DefaultModelInstance" },
  ];
  private bodies: BodyRecord[] = [
    { index: WORLD_BODY, instance: WORLD_MODEL_INSTANCE, name: "world", link: null, frame: WORLD_FRAME },
  ];
  private frames: FrameRecord[] = [
    { index: WORLD_FRAME, instance: WORLD_MODEL_INSTANCE, name: "world", body: WORLD_BODY, spec: null },
  ];
  private joints: JointRecord[] = [];
  private actuators: ActuatorRecord[] = [];
  private forceElements: ForceElementRecord[] = [];
  private geometries: GeometryRecord[] = [];
  private filteredPairs = new Set<string>();
  private finalized = false;

  hasModelInstanceNamed(name: string) {
    return this.instances.some((instance) => instance.name === name);
  }

  addModelInstance(name: string): ModelInstanceIndex {
    this.assertMutable();
    if (this.hasModelInstanceNamed(name)) {
      throw new Error(`Model instance '${name}' already exists.`);
    }
    const index = this.instances.length;
    this.instances.push({ index, name });
    return index;
  }

  addRigidBody(instance: ModelInstanceIndex, link: LinkSpec): BodyIndex {
    this.assertMutable();
    this.assertInstance(instance);
    if (this.findBody(link.name, instance)) {
      throw new Error(`Body '${link.name}' already exists in model instance ${instance}.`);
    }
    const index = this.bodies.length;
    const frame = this.frames.length;
    this.frames.push({ index: frame, instance, name: link.name, body: index, spec: null });
    this.bodies.push({ index, instance, name: link.name, link, frame });
    return index;
  }

  bodyFrame(body: BodyIndex): FrameIndex {
    return this.requireBody(body).frame;
  }

  registerGeometry(body: BodyIndex, registration: GeometryRegistration): GeometryId {
    this.assertMutable();
    this.requireBody(body);
    const id = this.geometries.length;
    this.geometries.push({ id, body, registration });
    return id;
  }

  addFrame(instance: ModelInstanceIndex, spec: FrameSpec, body: BodyIndex): FrameIndex {
    this.assertMutable();
    this.assertInstance(instance);
    this.requireBody(body);
    const index = this.frames.length;
    this.frames.push({ index, instance, name: spec.name, body, spec });
    return index;
  }

  addJoint(instance: ModelInstanceIndex, spec: JointSpec, bodies: JointBodies): JointIndex {
    this.assertMutable();
    this.assertInstance(instance);
    this.requireBody(bodies.parent);
    this.requireBody(bodies.child);
    const index = this.joints.length;
    this.joints.push({ index, instance, spec, bodies });
    return index;
  }

  addJointActuator(instance: ModelInstanceIndex, spec: ActuatorSpec, joint: JointIndex): ActuatorIndex {
    this.assertMutable();
    this.assertInstance(instance);
    if (!this.joints[joint]) throw new Error(`Unknown joint index ${joint}.`);
    const index = this.actuators.length;
    this.actuators.push({ index, instance, spec, joint });
    return index;
  }

  addLinearBushing(instance: ModelInstanceIndex, spec: BushingSpec, frames: BushingFrames): ForceElementIndex {
    this.assertMutable();
    this.assertInstance(instance);
    if (!this.frames[frames.frameA] || !this.frames[frames.frameC]) {
      throw new Error(`Unknown frame index in bushing between ${frames.frameA} and ${frames.frameC}.`);
    }
    const index = this.forceElements.length;
    this.forceElements.push({ index, instance, kind: "linear_bushing_rpy", spec, frames });
    return index;
  }

  excludeCollisionsBetween(bodyA: BodyIndex, bodyB: BodyIndex) {
    this.assertMutable();
    this.requireBody(bodyA);
    this.requireBody(bodyB);
    this.filteredPairs.add(pairKey(bodyA, bodyB));
  }

  /** Adds the parent/child filter of every joint and freezes the builder. */
  finalize() {
    this.assertMutable();
    for (const joint of this.joints) {
      this.filteredPairs.add(pairKey(joint.bodies.parent, joint.bodies.child));
    }
    this.finalized = true;
  }

  get isFinalized() {
    return this.finalized;
  }

  // Lookups

  getModelInstanceByName(name: string): ModelInstanceIndex | undefined {
    return this.instances.find((instance) => instance.name === name)?.index;
  }

  modelInstanceName(instance: ModelInstanceIndex): string | undefined {
    return this.instances[instance]?.name;
  }

  get numModelInstances() {
    return this.instances.length;
  }

  getBody(index: BodyIndex): BodyRecord | undefined {
    return this.bodies[index];
  }

  findBody(name: string, instance?: ModelInstanceIndex): BodyRecord | undefined {
    return this.bodies.find((body) => body.name === name && (instance === undefined || body.instance === instance));
  }

  bodiesOf(instance: ModelInstanceIndex) {
    return this.bodies.filter((body) => body.instance === instance);
  }

  get numBodies() {
    return this.bodies.length;
  }

  getFrame(index: FrameIndex): FrameRecord | undefined {
    return this.frames[index];
  }

  findFrame(name: string, instance?: ModelInstanceIndex): FrameRecord | undefined {
    return this.frames.find((frame) => frame.name === name && (instance === undefined || frame.instance === instance));
  }

  findJoint(name: string, instance?: ModelInstanceIndex): JointRecord | undefined {
    return this.joints.find((joint) => joint.spec.name === name && (instance === undefined || joint.instance === instance));
  }

  get numJoints() {
    return this.joints.length;
  }

  findActuator(name: string, instance?: ModelInstanceIndex): ActuatorRecord | undefined {
    return this.actuators.find(
      (actuator) => actuator.spec.name === name && (instance === undefined || actuator.instance === instance)
    );
  }

  get numActuators() {
    return this.actuators.length;
  }

  forceElementsOf(instance: ModelInstanceIndex) {
    return this.forceElements.filter((element) => element.instance === instance);
  }

  get numForceElements() {
    return this.forceElements.length;
  }

  geometriesOf(body: BodyIndex, role?: GeometryRegistration["role"]) {
    return this.geometries.filter(
      (geometry) => geometry.body === body && (role === undefined || geometry.registration.role === role)
    );
  }

  isCollisionFiltered(bodyA: BodyIndex, bodyB: BodyIndex) {
    return this.filteredPairs.has(pairKey(bodyA, bodyB));
  }

  get numFilteredPairs() {
    return this.filteredPairs.size;
  }

  private requireBody(body: BodyIndex): BodyRecord {
    const record = this.bodies[body];
    if (!record) throw new Error(`Unknown body index ${body}.`);
    return record;
  }

  private assertInstance(instance: ModelInstanceIndex) {
    if (!this.instances[instance]) throw new Error(`Unknown model instance ${instance}.`);
  }

  private assertMutable() {
    if (this.finalized) throw new Error("The model builder is finalized; no further elements can be added.");
  }
}
