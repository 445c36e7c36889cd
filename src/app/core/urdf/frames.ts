import type { BodyIndex } from "../model/types";
import type { UrdfParseContext } from "./context";
import { FAILED, ok, type ElementResult } from "./diagnostics";
import type { FrameSpec } from "./urdfModel";
import { readName, readPoseAttributes } from "./xml";

export type ParsedFrame = { frame: FrameSpec; body: BodyIndex };

/** `<frame name link xyz rpy>`: a named pose fixed to a committed link. */
export function parseFrame(ctx: UrdfParseContext, el: Element): ElementResult<ParsedFrame> {
  const sink = ctx.diagnostics;
  const name = readName(el, "name");
  if (!name) return sink.fail(el, "Error while parsing frame name.");

  const link = readName(el, "link");
  if (!link) return sink.fail(el, `missing link name for frame ${name}.`);

  const body = ctx.names.resolveLink(link);
  if (body === undefined) {
    return sink.fail(el, `Could not find link named '${link}' with model instance ID ${ctx.instance} for element 'frame'.`);
  }

  const pose = readPoseAttributes(sink, el);
  if (!pose) return FAILED;
  return ok({ frame: { name, link, pose }, body });
}
