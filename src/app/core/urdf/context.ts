import type { PackageMap } from "../loaders/packageMap";
import type { ModelBuilder, ModelInstanceIndex } from "../model/types";
import type { DiagnosticSink } from "./diagnostics";
import type { NameIndex } from "./nameIndex";

export type VendorTags = {
  prefix: string;
  ignore: string;
  joint: string;
  acceleration: string;
  capsule: string;
  ellipsoid: string;
  rotorInertia: string;
  gearRatio: string;
  linearBushing: string;
  bushingFrameA: string;
  bushingFrameC: string;
  bushingTorqueStiffness: string;
  bushingTorqueDamping: string;
  bushingForceStiffness: string;
  bushingForceDamping: string;
  collisionFilterGroup: string;
  member: string;
  ignoredCollisionFilterGroup: string;
};

export function vendorTags(prefix: string): VendorTags {
  const tag = (local: string) => `${prefix}:${local}`;
  return {
    prefix,
    ignore: tag("ignore"),
    joint: tag("joint"),
    acceleration: tag("acceleration"),
    capsule: tag("capsule"),
    ellipsoid: tag("ellipsoid"),
    rotorInertia: tag("rotor_inertia"),
    gearRatio: tag("gear_ratio"),
    linearBushing: tag("linear_bushing_rpy"),
    bushingFrameA: tag("bushing_frameA"),
    bushingFrameC: tag("bushing_frameC"),
    bushingTorqueStiffness: tag("bushing_torque_stiffness"),
    bushingTorqueDamping: tag("bushing_torque_damping"),
    bushingForceStiffness: tag("bushing_force_stiffness"),
    bushingForceDamping: tag("bushing_force_damping"),
    collisionFilterGroup: tag("collision_filter_group"),
    member: tag("member"),
    ignoredCollisionFilterGroup: tag("ignored_collision_filter_group"),
  };
}

/** State shared by every element handler during one parse call. */
export type UrdfParseContext = {
  readonly instance: ModelInstanceIndex;
  readonly builder: ModelBuilder;
  readonly packageMap: PackageMap;
  readonly diagnostics: DiagnosticSink;
  readonly names: NameIndex;
  readonly tags: VendorTags;
  /** Base directory for relative resource paths. */
  readonly rootDir: string;
};
