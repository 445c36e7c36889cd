import { resolveResourceUri } from "../loaders/packageMap";
import type { UrdfParseContext } from "./context";
import { FAILED, isElementFailure, ok, type ElementFailure, type ElementResult } from "./diagnostics";
import { childElement, missingAttributeMessage, readName, readNumberTuple } from "./xml";
import type { MaterialSpec, Rgba } from "./urdfModel";

type Appearance = { rgba?: Rgba; texture?: string };

function readAppearance(ctx: UrdfParseContext, el: Element, owner: string): Appearance | ElementFailure {
  const sink = ctx.diagnostics;
  const appearance: Appearance = {};

  const color = childElement(el, "color");
  if (color) {
    if (!color.hasAttribute("rgba")) return sink.fail(color, missingAttributeMessage(color, "rgba", owner));
    const values = readNumberTuple(sink, color, "rgba", 4, []);
    if (!values) return FAILED;
    appearance.rgba = [values[0], values[1], values[2], values[3]];
  }

  const texture = childElement(el, "texture");
  if (texture) {
    const filename = readName(texture, "filename");
    if (!filename) return sink.fail(texture, missingAttributeMessage(texture, "filename", owner));
    const resolved = resolveResourceUri(filename, ctx.packageMap, ctx.rootDir);
    if (!resolved.ok) return sink.fail(texture, `Unable to resolve texture '${filename}' of ${owner}: ${resolved.reason}.`);
    appearance.texture = resolved.path;
  }

  return appearance;
}

export function sameMaterial(a: MaterialSpec, b: MaterialSpec) {
  const sameRgba =
    a.rgba === undefined || b.rgba === undefined
      ? a.rgba === b.rgba
      : a.rgba.every((value, i) => value === b.rgba?.[i]);
  return a.name === b.name && a.texture === b.texture && sameRgba;
}

/** Top-level `<material>`: a named color and/or texture later visuals can refer to. */
export function parseMaterial(ctx: UrdfParseContext, el: Element): ElementResult<MaterialSpec> {
  const sink = ctx.diagnostics;
  const name = readName(el, "name");
  if (!name) return sink.fail(el, "material tag is missing name attribute.");

  const appearance = readAppearance(ctx, el, `material '${name}'`);
  if (isElementFailure(appearance)) return appearance;
  if (!appearance.rgba && appearance.texture === undefined) {
    return sink.fail(el, `Material '${name}' has neither a color nor a texture.`);
  }
  return ok({ name, ...appearance });
}

/**
 * Material of a `<visual>`. Inline color or texture wins; otherwise the name
 * must refer to a material committed earlier. Returns undefined (after
 * recording an error) when neither works.
 */
export function resolveVisualMaterial(ctx: UrdfParseContext, el: Element, link: string): MaterialSpec | undefined {
  const sink = ctx.diagnostics;
  const name = readName(el, "name") ?? "";
  const appearance = readAppearance(ctx, el, `link '${link}'`);
  if (isElementFailure(appearance)) return undefined;
  if (appearance.rgba || appearance.texture !== undefined) return { name, ...appearance };

  if (!name) {
    sink.error(el, `A <material> on link '${link}' has no name, color or texture.`);
    return undefined;
  }
  const registered = ctx.names.materials.get(name);
  if (!registered) {
    sink.error(el, `Material '${name}' was used but not defined.`);
    return undefined;
  }
  return registered;
}
