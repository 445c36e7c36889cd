import type { UrdfParseContext } from "../context";
import { FAILED, ok, type ElementResult } from "../diagnostics";
import type { JointSpec, JointType, Pose, SingleAxisJointSpec } from "../urdfModel";
import { readAxis, readDamping, readLimitValues, singleDofLimits, unboundedLimits } from "./jointElements";

export type JointParseInput = {
  ctx: UrdfParseContext;
  el: Element;
  name: string;
  parent: string;
  child: string;
  origin: Pose;
};

/** `standard` types belong in `<joint>`, `custom` ones in the vendor joint tag. */
export type JointTag = "standard" | "custom";

export type JointTypeHandler = {
  tag: JointTag;
  parse: (input: JointParseInput) => ElementResult<JointSpec>;
};

const singleAxis = (type: SingleAxisJointSpec["type"]): JointTypeHandler => ({
  tag: "standard",
  parse: ({ ctx, el, name, parent, child, origin }) => {
    const axis = readAxis(ctx, el, name);
    if (!axis) return FAILED;
    const limits = readLimitValues(ctx, el);
    if (!limits) return FAILED;
    const damping = readDamping(ctx, el, name);
    if (damping === null) return FAILED;
    return ok<JointSpec>({
      type,
      name,
      parent,
      child,
      origin,
      axis,
      damping,
      effortLimit: limits.effort,
      limits: singleDofLimits(limits, type !== "continuous"),
    });
  },
});

const multiDof = (type: "ball" | "universal", dofs: number): JointTypeHandler => ({
  tag: "custom",
  parse: ({ ctx, el, name, parent, child, origin }) => {
    const limits = readLimitValues(ctx, el);
    if (!limits) return FAILED;
    const damping = readDamping(ctx, el, name);
    if (damping === null) return FAILED;
    return ok<JointSpec>({ type, name, parent, child, origin, damping, effortLimit: limits.effort, limits: unboundedLimits(dofs) });
  },
});

export const JOINT_TYPES: Readonly<Record<JointType, JointTypeHandler>> = {
  revolute: singleAxis("revolute"),
  continuous: singleAxis("continuous"),
  prismatic: singleAxis("prismatic"),
  fixed: {
    tag: "standard",
    parse: ({ ctx, el, name, parent, child, origin }) => {
      const limits = readLimitValues(ctx, el);
      if (!limits) return FAILED;
      return ok<JointSpec>({ type: "fixed", name, parent, child, origin, effortLimit: limits.effort });
    },
  },
  floating: {
    tag: "standard",
    parse: ({ ctx, el, name, child }) =>
      ctx.diagnostics.skip(
        el,
        `Joint '${name}' specified as type floating which is not supported by the model builder.  ` +
          `Leaving '${child}' as a free body.`
      ),
  },
  planar: {
    tag: "standard",
    parse: ({ ctx, el, name, parent, child, origin }) => {
      const axis = readAxis(ctx, el, name);
      if (!axis) return FAILED;
      const limits = readLimitValues(ctx, el);
      if (!limits) return FAILED;
      const damping = readDamping(ctx, el, name);
      if (damping === null) return FAILED;
      return ok<JointSpec>({
        type: "planar",
        name,
        parent,
        child,
        origin,
        axis,
        damping: [damping, damping, damping],
        effortLimit: limits.effort,
        limits: unboundedLimits(3),
      });
    },
  },
  ball: multiDof("ball", 3),
  universal: multiDof("universal", 2),
};

function isJointType(type: string): type is JointType {
  return Object.prototype.hasOwnProperty.call(JOINT_TYPES, type);
}

export function lookupJointType(type: string): JointTypeHandler | undefined {
  return isJointType(type) ? JOINT_TYPES[type] : undefined;
}
