import type { BushingFrames, FrameIndex } from "../model/types";
import type { UrdfParseContext } from "./context";
import { FAILED, isElementFailure, ok, type ElementFailure, type ElementResult } from "./diagnostics";
import type { BushingSpec, Vec3 } from "./urdfModel";
import { childElement, readAttribute, readName, readVec3Attribute } from "./xml";

export type ParsedBushing = { bushing: BushingSpec; frames: BushingFrames };

type NamedFrame = { name: string; index: FrameIndex };

function readBushingFrame(ctx: UrdfParseContext, el: Element, tag: string): NamedFrame | ElementFailure {
  const sink = ctx.diagnostics;
  const frameEl = childElement(el, tag);
  if (!frameEl) return sink.fail(el, `Unable to find the <${tag}> tag`);
  const name = readName(frameEl, "name");
  if (!name) return sink.fail(frameEl, `Unable to read the 'name' attribute for the <${tag}> tag`);
  const index = ctx.names.resolveFrame(name);
  if (index === undefined) return sink.fail(frameEl, `Frame: ${name} specified for <${tag}> does not exist in the model.`);
  return { name, index };
}

function readBushingVector(ctx: UrdfParseContext, el: Element, tag: string): Vec3 | ElementFailure {
  const sink = ctx.diagnostics;
  const vectorEl = childElement(el, tag);
  if (!vectorEl) return sink.fail(el, `Unable to find the <${tag}> tag`);
  if (readAttribute(vectorEl, "value") === null) {
    return sink.fail(vectorEl, `Unable to read the 'value' attribute for the <${tag}> tag`);
  }
  return readVec3Attribute(sink, vectorEl, "value", [0, 0, 0]) ?? FAILED;
}

/**
 * `<V:linear_bushing_rpy>` between two frames. Tags are read in declared
 * order and the first problem abandons the bushing.
 */
export function parseBushing(ctx: UrdfParseContext, el: Element): ElementResult<ParsedBushing> {
  const { tags } = ctx;
  const frameA = readBushingFrame(ctx, el, tags.bushingFrameA);
  if (isElementFailure(frameA)) return frameA;
  const frameC = readBushingFrame(ctx, el, tags.bushingFrameC);
  if (isElementFailure(frameC)) return frameC;

  const torqueStiffness = readBushingVector(ctx, el, tags.bushingTorqueStiffness);
  if (isElementFailure(torqueStiffness)) return torqueStiffness;
  const torqueDamping = readBushingVector(ctx, el, tags.bushingTorqueDamping);
  if (isElementFailure(torqueDamping)) return torqueDamping;
  const forceStiffness = readBushingVector(ctx, el, tags.bushingForceStiffness);
  if (isElementFailure(forceStiffness)) return forceStiffness;
  const forceDamping = readBushingVector(ctx, el, tags.bushingForceDamping);
  if (isElementFailure(forceDamping)) return forceDamping;

  return ok({
    bushing: { frameA: frameA.name, frameC: frameC.name, torqueStiffness, torqueDamping, forceStiffness, forceDamping },
    frames: { frameA: frameA.index, frameC: frameC.index },
  });
}
