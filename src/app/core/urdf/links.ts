import { resolveResourceUri } from "../loaders/packageMap";
import type { UrdfParseContext } from "./context";
import { FAILED, ok, type ElementResult } from "./diagnostics";
import { resolveVisualMaterial } from "./materials";
import { WORLD_LINK } from "./nameIndex";
import type { CollisionSpec, GeometrySpec, InertialSpec, LinkSpec, VisualSpec } from "./urdfModel";
import {
  childElement,
  childElements,
  missingAttributeMessage,
  readName,
  readNumberAttribute,
  readOrigin,
  readRequiredNumber,
  readRequiredVec3,
  readVec3Attribute,
} from "./xml";

const INERTIA_KEYS = ["ixx", "iyy", "izz", "ixy", "ixz", "iyz"] as const;

function readInertial(ctx: UrdfParseContext, el: Element, link: string): InertialSpec | null {
  const sink = ctx.diagnostics;
  const origin = readOrigin(sink, el);
  if (!origin) return null;

  let mass = 0;
  const massEl = childElement(el, "mass");
  if (massEl) {
    const value = readRequiredNumber(sink, massEl, "value", `link '${link}'`);
    if (value === null) return null;
    mass = value;
  }

  const inertia = { ixx: 0, iyy: 0, izz: 0, ixy: 0, ixz: 0, iyz: 0 };
  const inertiaEl = childElement(el, "inertia");
  if (inertiaEl) {
    for (const key of INERTIA_KEYS) {
      const value = readNumberAttribute(sink, inertiaEl, key, 0);
      if (value === null) return null;
      inertia[key] = value;
    }
  }

  if (mass === 0 && INERTIA_KEYS.some((key) => inertia[key] !== 0)) {
    sink.error(el, `Link '${link}' has zero mass but non-zero rotational inertia.`);
    return null;
  }
  return { origin, mass, inertia };
}

function readShape(ctx: UrdfParseContext, shape: Element, owner: string): GeometrySpec | null {
  const sink = ctx.diagnostics;
  switch (shape.tagName) {
    case "box": {
      const size = readRequiredVec3(sink, shape, "size", owner);
      return size ? { kind: "box", size } : null;
    }
    case "sphere": {
      const radius = readRequiredNumber(sink, shape, "radius", owner);
      return radius === null ? null : { kind: "sphere", radius };
    }
    case "cylinder":
    case ctx.tags.capsule: {
      const radius = readRequiredNumber(sink, shape, "radius", owner);
      if (radius === null) return null;
      const length = readRequiredNumber(sink, shape, "length", owner);
      if (length === null) return null;
      if (shape.tagName === "cylinder") return { kind: "cylinder", radius, length };
      return { kind: "capsule", radius, length };
    }
    case ctx.tags.ellipsoid: {
      const a = readRequiredNumber(sink, shape, "a", owner);
      if (a === null) return null;
      const b = readRequiredNumber(sink, shape, "b", owner);
      if (b === null) return null;
      const c = readRequiredNumber(sink, shape, "c", owner);
      if (c === null) return null;
      return { kind: "ellipsoid", a, b, c };
    }
    case "mesh": {
      const filename = readName(shape, "filename");
      if (!filename) {
        sink.error(shape, missingAttributeMessage(shape, "filename", owner));
        return null;
      }
      const scale = readVec3Attribute(sink, shape, "scale", [1, 1, 1]);
      if (!scale) return null;
      const resolved = resolveResourceUri(filename, ctx.packageMap, ctx.rootDir);
      if (!resolved.ok) {
        sink.error(shape, `Unable to resolve mesh '${filename}' of ${owner}: ${resolved.reason}.`);
        return null;
      }
      return { kind: "mesh", filename, resolvedPath: resolved.path, scale };
    }
    default:
      sink.error(shape, `The <geometry> of ${owner} has no recognized shape.`);
      return null;
  }
}

type PlacedGeometry = { name?: string; origin: VisualSpec["origin"]; geometry: GeometrySpec };

function readPlacedGeometry(ctx: UrdfParseContext, el: Element, link: string): PlacedGeometry | null {
  const sink = ctx.diagnostics;
  const owner = `link '${link}'`;
  const origin = readOrigin(sink, el);
  if (!origin) return null;

  const geometryEl = childElement(el, "geometry");
  if (!geometryEl) {
    sink.error(el, `A <${el.tagName}> on ${owner} is missing a <geometry> element.`);
    return null;
  }
  const shapes = childElements(geometryEl);
  if (shapes.length !== 1) {
    sink.error(geometryEl, `The <geometry> of ${owner} has no recognized shape.`);
    return null;
  }
  const geometry = readShape(ctx, shapes[0], owner);
  if (!geometry) return null;

  const name = readName(el, "name");
  return name ? { name, origin, geometry } : { origin, geometry };
}

function readVisuals(ctx: UrdfParseContext, linkEl: Element, link: string): VisualSpec[] {
  const visuals: VisualSpec[] = [];
  for (const el of childElements(linkEl, "visual")) {
    const placed = readPlacedGeometry(ctx, el, link);
    if (!placed) continue;
    const materialEl = childElement(el, "material");
    const material = materialEl ? resolveVisualMaterial(ctx, materialEl, link) : undefined;
    visuals.push(material ? { ...placed, material } : placed);
  }
  return visuals;
}

function readCollisions(ctx: UrdfParseContext, linkEl: Element, link: string): CollisionSpec[] {
  const collisions: CollisionSpec[] = [];
  for (const el of childElements(linkEl, "collision")) {
    const placed = readPlacedGeometry(ctx, el, link);
    if (placed) collisions.push(placed);
  }
  return collisions;
}

/**
 * `<link>`: inertia plus visual and collision geometry. A broken geometry only
 * drops that geometry; a broken inertial drops the link.
 */
export function parseLink(ctx: UrdfParseContext, el: Element): ElementResult<LinkSpec> {
  const sink = ctx.diagnostics;
  const name = readName(el, "name");
  if (!name) return sink.fail(el, "link tag is missing name attribute.");

  let inertial: InertialSpec | undefined;
  const inertialEl = childElement(el, "inertial");
  if (inertialEl && name === WORLD_LINK) {
    sink.warning(
      inertialEl,
      `A URDF file declared the "world" link and then attempted to assign mass properties (via the <inertial> tag). ` +
        `Only geometries, <collision> and <visual>, can be assigned to the world link. The <inertial> tag is being ignored.`
    );
  } else if (inertialEl) {
    const read = readInertial(ctx, inertialEl, name);
    if (!read) return FAILED;
    inertial = read;
  }

  const spec: LinkSpec = {
    name,
    visuals: readVisuals(ctx, el, name),
    collisions: readCollisions(ctx, el, name),
  };
  return ok(inertial ? { ...spec, inertial } : spec);
}
