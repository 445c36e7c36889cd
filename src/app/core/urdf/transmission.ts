import type { JointIndex } from "../model/types";
import type { UrdfParseContext } from "./context";
import { FAILED, ok, type ElementResult } from "./diagnostics";
import { jointDofs, type TransmissionSpec } from "./urdfModel";
import { childElement, readAttribute, readName, readNumberAttribute } from "./xml";

const SUPPORTED_TRANSMISSION = "SimpleTransmission";

export type ParsedTransmission = { transmission: TransmissionSpec; joint: JointIndex };

function readTransmissionType(el: Element): string | null {
  const attribute = readName(el, "type");
  if (attribute) return attribute;
  const text = childElement(el, "type")?.textContent?.trim();
  return text ? text : null;
}

/** `<V:rotor_inertia value>` / `<V:gear_ratio value>` under `<actuator>`; `fallback` when absent. */
function readActuatorParameter(
  ctx: UrdfParseContext,
  actuatorEl: Element,
  actuator: string,
  tag: string,
  fallback: number
): number | null {
  const el = childElement(actuatorEl, tag);
  if (!el) return fallback;
  if (readAttribute(el, "value") === null) {
    ctx.diagnostics.error(el, `joint actuator ${actuator}'s ${tag} does not have a "value" attribute!`);
    return null;
  }
  return readNumberAttribute(ctx.diagnostics, el, "value", fallback);
}

/**
 * `<transmission>`: binds one actuator to one committed single-DOF joint.
 * Only SimpleTransmission is understood; the effort limit is copied from the joint.
 */
export function parseTransmission(ctx: UrdfParseContext, el: Element): ElementResult<ParsedTransmission> {
  const sink = ctx.diagnostics;
  const type = readTransmissionType(el);
  if (!type) return sink.fail(el, "Transmission element is missing a type.");
  if (!type.includes(SUPPORTED_TRANSMISSION)) {
    return sink.skip(
      el,
      "A <transmission> has a type that isn't 'SimpleTransmission'. Only 'SimpleTransmission' is supported; " +
        "all other transmission types will be ignored."
    );
  }

  const actuatorEl = childElement(el, "actuator");
  if (!actuatorEl) return sink.fail(el, "Transmission is missing an actuator element.");
  const actuatorName = readName(actuatorEl, "name");
  if (!actuatorName) return sink.fail(actuatorEl, "Transmission is missing an actuator name.");

  const jointEl = childElement(el, "joint");
  if (!jointEl) return sink.fail(el, "Transmission is missing a joint element.");
  const jointName = readName(jointEl, "name");
  if (!jointName) return sink.fail(jointEl, "Transmission is missing a joint name.");
  const joint = ctx.names.joints.get(jointName);
  if (!joint) return sink.fail(jointEl, `Transmission specifies joint '${jointName}' which does not exist.`);

  if (joint.spec.type === "fixed") {
    return sink.skip(el, `Skipping transmission since it's attached to a fixed joint "${jointName}".`);
  }
  if (jointDofs(joint.spec) !== 1) {
    return sink.fail(
      jointEl,
      `Transmission specifies joint '${jointName}' of type ${joint.spec.type}, which cannot be actuated.`
    );
  }

  const effortLimit = joint.spec.effortLimit;
  if (effortLimit === 0) {
    return sink.skip(
      el,
      `Skipping transmission since it's attached to joint "${jointName}" which has a zero effort limit ${effortLimit}.`
    );
  }
  if (effortLimit < 0) {
    return sink.fail(jointEl, `Transmission specifies joint '${jointName}' which has a negative effort limit.`);
  }

  const rotorInertia = readActuatorParameter(ctx, actuatorEl, actuatorName, ctx.tags.rotorInertia, 0);
  if (rotorInertia === null) return FAILED;
  const gearRatio = readActuatorParameter(ctx, actuatorEl, actuatorName, ctx.tags.gearRatio, 1);
  if (gearRatio === null) return FAILED;

  return ok({
    transmission: {
      type,
      joint: jointName,
      actuator: { name: actuatorName, joint: jointName, effortLimit, rotorInertia, gearRatio },
    },
    joint: joint.index,
  });
}
