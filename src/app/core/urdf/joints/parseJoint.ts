import type { BodyIndex, JointBodies } from "../../model/types";
import type { UrdfParseContext } from "../context";
import { FAILED, isElementFailure, ok, type ElementFailure, type ElementResult } from "../diagnostics";
import type { JointSpec } from "../urdfModel";
import { childElement, readName, readOrigin } from "../xml";
import { lookupJointType } from "./jointTypes";

export type ParsedJoint = { joint: JointSpec; bodies: JointBodies };

type Endpoint = { link: string; element: Element };

function readEndpoint(
  ctx: UrdfParseContext,
  el: Element,
  name: string,
  role: "parent" | "child"
): Endpoint | ElementFailure {
  const endpoint = childElement(el, role);
  if (!endpoint) return ctx.diagnostics.fail(el, `joint '${name}' doesn't have a ${role} node!`);
  const link = readName(endpoint, "link");
  if (!link) return ctx.diagnostics.fail(endpoint, `joint ${name}'s ${role} does not have a link attribute!`);
  return { link, element: endpoint };
}

function resolveEndpointBody(ctx: UrdfParseContext, endpoint: Endpoint): BodyIndex | undefined {
  const body = ctx.names.resolveLink(endpoint.link);
  if (body === undefined) {
    ctx.diagnostics.error(
      endpoint.element,
      `Could not find link named '${endpoint.link}' with model instance ID ${ctx.instance} for element 'joint'.`
    );
  }
  return body;
}

/** `<joint>` or the vendor joint tag, dispatched on `type` through the joint registry. */
export function parseJoint(ctx: UrdfParseContext, el: Element): ElementResult<ParsedJoint> {
  const sink = ctx.diagnostics;
  const name = readName(el, "name");
  if (!name) return sink.fail(el, "joint tag is missing name attribute.");
  const type = readName(el, "type");
  if (!type) return sink.fail(el, `joint '${name}' is missing type attribute.`);

  const handler = lookupJointType(type);
  if (!handler) return sink.fail(el, `Joint '${name}' has unrecognized type: '${type}'`);
  const customTag = el.tagName === ctx.tags.joint;
  if (handler.tag === "standard" && customTag) {
    return sink.fail(el, `Joint ${name} of type ${type} is a standard joint type, and should be a <joint>`);
  }
  if (handler.tag === "custom" && !customTag) {
    return sink.fail(el, `Joint ${name} of type ${type} is a custom joint type, and should be a <${ctx.tags.joint}>`);
  }

  const parent = readEndpoint(ctx, el, name, "parent");
  if (isElementFailure(parent)) return parent;
  const child = readEndpoint(ctx, el, name, "child");
  if (isElementFailure(child)) return child;

  const parentBody = resolveEndpointBody(ctx, parent);
  if (parentBody === undefined) return FAILED;
  const childBody = resolveEndpointBody(ctx, child);
  if (childBody === undefined) return FAILED;

  const origin = readOrigin(sink, el);
  if (!origin) return FAILED;

  const result = handler.parse({ ctx, el, name, parent: parent.link, child: child.link, origin });
  if (result.status !== "ok") return result;
  return ok({ joint: result.spec, bodies: { parent: parentBody, child: childBody } });
}
