export type Vec3 = [number, number, number];
export type Rgba = [number, number, number, number];

export type Pose = { xyz: Vec3; rpy: Vec3 };

export const zeroPose = (): Pose => ({ xyz: [0, 0, 0], rpy: [0, 0, 0] });

export type DataSource = { kind: "file"; path: string } | { kind: "contents"; text: string };

export type GeometrySpec =
  | { kind: "box"; size: Vec3 }
  | { kind: "sphere"; radius: number }
  | { kind: "cylinder"; radius: number; length: number }
  | { kind: "capsule"; radius: number; length: number }
  | { kind: "ellipsoid"; a: number; b: number; c: number }
  | { kind: "mesh"; filename: string; resolvedPath: string; scale: Vec3 };

export type MaterialSpec = {
  name: string;
  rgba?: Rgba;
  texture?: string;
};

export type VisualSpec = {
  name?: string;
  origin: Pose;
  geometry: GeometrySpec;
  material?: MaterialSpec;
};

export type CollisionSpec = {
  name?: string;
  origin: Pose;
  geometry: GeometrySpec;
};

export type InertiaSpec = {
  ixx: number;
  iyy: number;
  izz: number;
  ixy: number;
  ixz: number;
  iyz: number;
};

export type InertialSpec = {
  origin: Pose;
  mass: number;
  inertia: InertiaSpec;
};

export type LinkSpec = {
  name: string;
  inertial?: InertialSpec;
  visuals: VisualSpec[];
  collisions: CollisionSpec[];
};

/** Per-degree-of-freedom bounds; `lower[i]` pairs with `upper[i]`. */
export type Bounds = { lower: number[]; upper: number[] };

export type JointLimits = {
  position: Bounds;
  velocity: Bounds;
  acceleration: Bounds;
};

type JointCommon = {
  name: string;
  parent: string;
  child: string;
  origin: Pose;
  /** Taken from `<limit effort>`; +Infinity when unspecified. */
  effortLimit: number;
};

export type SingleAxisJointSpec = JointCommon & {
  type: "revolute" | "continuous" | "prismatic";
  axis: Vec3;
  damping: number;
  limits: JointLimits;
};

export type FixedJointSpec = JointCommon & { type: "fixed" };

export type PlanarJointSpec = JointCommon & {
  type: "planar";
  /** Normal of the plane of motion. */
  axis: Vec3;
  damping: Vec3;
  limits: JointLimits;
};

export type BallJointSpec = JointCommon & { type: "ball"; damping: number; limits: JointLimits };

export type UniversalJointSpec = JointCommon & { type: "universal"; damping: number; limits: JointLimits };

export type JointSpec = SingleAxisJointSpec | FixedJointSpec | PlanarJointSpec | BallJointSpec | UniversalJointSpec;

/** Every keyword the joint registry knows; `floating` never produces a spec. */
export type JointType = JointSpec["type"] | "floating";

export type FrameSpec = {
  name: string;
  link: string;
  pose: Pose;
};

export type ActuatorSpec = {
  name: string;
  joint: string;
  effortLimit: number;
  rotorInertia: number;
  gearRatio: number;
};

export type TransmissionSpec = {
  type: string;
  actuator: ActuatorSpec;
  joint: string;
};

export type BushingSpec = {
  frameA: string;
  frameC: string;
  torqueStiffness: Vec3;
  torqueDamping: Vec3;
  forceStiffness: Vec3;
  forceDamping: Vec3;
};

export type CollisionFilterGroupSpec = {
  name: string;
  members: string[];
  ignoredGroups: string[];
  selfIgnore: boolean;
};

export const jointDofs = (joint: JointSpec): number => {
  switch (joint.type) {
    case "fixed":
      return 0;
    case "revolute":
    case "continuous":
    case "prismatic":
      return 1;
    case "universal":
      return 2;
    case "planar":
    case "ball":
      return 3;
  }
};
