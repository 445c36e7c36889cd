import type { UrdfParseContext } from "../context";
import type { Bounds, JointLimits, Vec3 } from "../urdfModel";
import { childElement, readNumberAttribute, readVec3Attribute } from "../xml";

const AXIS_EPSILON = 1e-8;

/** Values of `<limit>`, each defaulting to the unbounded side. */
export type LimitValues = {
  lower: number;
  upper: number;
  velocity: number;
  acceleration: number;
  effort: number;
};

const UNLIMITED: LimitValues = {
  lower: -Infinity,
  upper: Infinity,
  velocity: Infinity,
  acceleration: Infinity,
  effort: Infinity,
};

export function readLimitValues(ctx: UrdfParseContext, jointEl: Element): LimitValues | null {
  const limit = childElement(jointEl, "limit");
  if (!limit) return { ...UNLIMITED };
  const sink = ctx.diagnostics;

  const lower = readNumberAttribute(sink, limit, "lower", UNLIMITED.lower);
  if (lower === null) return null;
  const upper = readNumberAttribute(sink, limit, "upper", UNLIMITED.upper);
  if (upper === null) return null;
  const velocity = readNumberAttribute(sink, limit, "velocity", UNLIMITED.velocity);
  if (velocity === null) return null;
  const acceleration = readNumberAttribute(sink, limit, ctx.tags.acceleration, UNLIMITED.acceleration);
  if (acceleration === null) return null;
  const effort = readNumberAttribute(sink, limit, "effort", UNLIMITED.effort);
  if (effort === null) return null;
  return { lower, upper, velocity, acceleration, effort };
}

const symmetric = (magnitude: number, dofs: number): Bounds => ({
  lower: Array.from({ length: dofs }, () => -magnitude),
  upper: Array.from({ length: dofs }, () => magnitude),
});

export const unboundedLimits = (dofs: number): JointLimits => ({
  position: symmetric(Infinity, dofs),
  velocity: symmetric(Infinity, dofs),
  acceleration: symmetric(Infinity, dofs),
});

export const singleDofLimits = (values: LimitValues, positionBounded: boolean): JointLimits => ({
  position: positionBounded ? { lower: [values.lower], upper: [values.upper] } : symmetric(Infinity, 1),
  velocity: symmetric(values.velocity, 1),
  acceleration: symmetric(values.acceleration, 1),
});

/**
 * `<dynamics damping>`. `friction` and `coulomb_window` are accepted but have
 * no effect beyond a warning.
 */
export function readDamping(ctx: UrdfParseContext, jointEl: Element, joint: string): number | null {
  const dynamics = childElement(jointEl, "dynamics");
  if (!dynamics) return 0;
  const sink = ctx.diagnostics;

  const damping = readNumberAttribute(sink, dynamics, "damping", 0);
  if (damping === null) return null;
  const friction = readNumberAttribute(sink, dynamics, "friction", 0);
  if (friction === null) return null;
  if (friction !== 0) {
    sink.warning(
      dynamics,
      `Joint '${joint}': joint friction is not supported by the model builder; the value ${friction} is ignored.`
    );
  }
  if (dynamics.hasAttribute("coulomb_window")) {
    sink.warning(dynamics, `Joint '${joint}': 'coulomb_window' is not supported by the model builder and is ignored.`);
  }
  return damping;
}

/** Unit `<axis xyz>`; `1 0 0` when absent. */
export function readAxis(ctx: UrdfParseContext, jointEl: Element, joint: string): Vec3 | null {
  const axisEl = childElement(jointEl, "axis");
  if (!axisEl) return [1, 0, 0];
  const xyz = readVec3Attribute(ctx.diagnostics, axisEl, "xyz", [1, 0, 0]);
  if (!xyz) return null;
  const norm = Math.hypot(xyz[0], xyz[1], xyz[2]);
  if (norm < AXIS_EPSILON) {
    ctx.diagnostics.error(axisEl, `Joint '${joint}' axis is zero.  Don't do that.`);
    return null;
  }
  return [xyz[0] / norm, xyz[1] / norm, xyz[2] / norm];
}
