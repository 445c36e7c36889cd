import fs from "node:fs";
import path from "node:path";
import { PackageMap } from "../loaders/packageMap";
import { RecordingModelBuilder } from "../model/RecordingModelBuilder";
import { WORLD_BODY, type ModelBuilder, type ModelInstanceIndex } from "../model/types";
import { createScopedLogger } from "../services/logger";
import { parseBushing } from "./bushing";
import { findUnknownIgnoredGroups, parseCollisionFilterGroup, resolveCollisionFilterPairs } from "./collisionFilterGroups";
import { vendorTags, type UrdfParseContext, type VendorTags } from "./context";
import {
  DiagnosticPolicy,
  DiagnosticSink,
  IN_MEMORY_FILENAME,
  type DiagnosticDetail,
  type DiagnosticOrigin,
} from "./diagnostics";
import { parseFrame } from "./frames";
import { parseJoint } from "./joints/parseJoint";
import { parseLink } from "./links";
import { parseMaterial, sameMaterial } from "./materials";
import { NameIndex, WORLD_LINK, type NameTable } from "./nameIndex";
import { parseTransmission } from "./transmission";
import { DEFAULT_VENDOR_PREFIX, type UrdfParseOptions } from "./urdfParseOptions";
import type { DataSource } from "./urdfModel";
import { childElements, parseXmlDocument, readAttribute, readName } from "./xml";

const log = createScopedLogger("urdf");

const ROBOT_TAG = "robot";

export type ParsingWorkspace = {
  packageMap: PackageMap;
  policy: DiagnosticPolicy;
  builder: ModelBuilder;
};

export type UrdfParseCallOptions = UrdfParseOptions & {
  modelName?: string;
  packageMap?: PackageMap;
  policy?: DiagnosticPolicy;
  /** Reuse a builder to add several models to one tree. */
  builder?: RecordingModelBuilder;
};

export type UrdfParseResult = {
  model: ModelInstanceIndex | null;
  builder: RecordingModelBuilder;
  diagnostics: DiagnosticDetail[];
};

type ElementHandler = (ctx: UrdfParseContext, el: Element) => void;

/** Reports `name` as a duplicate when the namespace already holds it. */
function isDuplicate<T>(ctx: UrdfParseContext, el: Element, table: NameTable<T>, name: string) {
  if (!table.has(name)) return false;
  ctx.diagnostics.error(el, `Duplicate ${table.label} name '${name}'; only the first declaration is used.`);
  return true;
}

const handleMaterial: ElementHandler = (ctx, el) => {
  const result = parseMaterial(ctx, el);
  if (result.status !== "ok") return;
  const material = result.spec;
  const existing = ctx.names.materials.get(material.name);
  if (existing) {
    if (!sameMaterial(existing, material)) {
      ctx.diagnostics.error(el, `Material '${material.name}' was multiply defined.`);
    }
    return;
  }
  ctx.names.materials.claim(material.name, material);
};

const handleLink: ElementHandler = (ctx, el) => {
  const result = parseLink(ctx, el);
  if (result.status !== "ok") return;
  const link = result.spec;
  if (isDuplicate(ctx, el, ctx.names.links, link.name)) return;

  const body = link.name === WORLD_LINK ? WORLD_BODY : ctx.builder.addRigidBody(ctx.instance, link);
  ctx.names.links.claim(link.name, body);
  ctx.names.linkFrames.claim(link.name, ctx.builder.bodyFrame(body));
  for (const visual of link.visuals) {
    ctx.builder.registerGeometry(body, { role: "visual", visual });
  }
  for (const collision of link.collisions) {
    ctx.builder.registerGeometry(body, { role: "collision", collision });
  }
};

const handleFrame: ElementHandler = (ctx, el) => {
  const result = parseFrame(ctx, el);
  if (result.status !== "ok") return;
  const { frame, body } = result.spec;
  if (isDuplicate(ctx, el, ctx.names.frames, frame.name)) return;
  if (frame.name === WORLD_LINK || ctx.names.linkFrames.has(frame.name)) {
    ctx.diagnostics.error(el, `Frame name '${frame.name}' is already used by a link.`);
    return;
  }
  ctx.names.frames.claim(frame.name, ctx.builder.addFrame(ctx.instance, frame, body));
};

const handleJoint: ElementHandler = (ctx, el) => {
  const result = parseJoint(ctx, el);
  if (result.status !== "ok") return;
  const { joint, bodies } = result.spec;
  if (isDuplicate(ctx, el, ctx.names.joints, joint.name)) return;
  const index = ctx.builder.addJoint(ctx.instance, joint, bodies);
  ctx.names.joints.claim(joint.name, { index, spec: joint });
};

const handleTransmission: ElementHandler = (ctx, el) => {
  const result = parseTransmission(ctx, el);
  if (result.status !== "ok") return;
  const { transmission, joint } = result.spec;
  const { actuator } = transmission;
  if (isDuplicate(ctx, el, ctx.names.actuators, actuator.name)) return;
  ctx.names.actuators.claim(actuator.name, ctx.builder.addJointActuator(ctx.instance, actuator, joint));
};

const handleLoopJoint: ElementHandler = (ctx, el) => {
  ctx.diagnostics.error(el, "loop joints are not supported by the model builder");
};

const handleBushing: ElementHandler = (ctx, el) => {
  const result = parseBushing(ctx, el);
  if (result.status !== "ok") return;
  ctx.builder.addLinearBushing(ctx.instance, result.spec.bushing, result.spec.frames);
};

const handleCollisionFilterGroup: ElementHandler = (ctx, el) => {
  const result = parseCollisionFilterGroup(ctx, el);
  if (result.status !== "ok") return;
  const group = result.spec;
  if (isDuplicate(ctx, el, ctx.names.groups, group.name)) return;
  ctx.names.groups.claim(group.name, { spec: group, element: el });
};

function elementHandlers(tags: VendorTags) {
  return new Map<string, ElementHandler>([
    ["material", handleMaterial],
    ["link", handleLink],
    ["frame", handleFrame],
    ["joint", handleJoint],
    [tags.joint, handleJoint],
    ["transmission", handleTransmission],
    ["loop_joint", handleLoopJoint],
    [tags.linearBushing, handleBushing],
    [tags.collisionFilterGroup, handleCollisionFilterGroup],
  ]);
}

function walkRobot(ctx: UrdfParseContext, robot: Element) {
  const handlers = elementHandlers(ctx.tags);
  for (const el of childElements(robot)) {
    if (readAttribute(el, ctx.tags.ignore) === "true") continue;
    handlers.get(el.tagName)?.(ctx, el);
  }
}

function applyCollisionFilterGroups(ctx: UrdfParseContext) {
  const committed = ctx.names.groups.values();
  const groups = committed.map((entry) => entry.spec);

  for (const { group, ignored } of findUnknownIgnoredGroups(groups)) {
    const element = ctx.names.groups.get(group)?.element ?? null;
    ctx.diagnostics.warning(element, `Collision filter group '${group}' ignores unknown group '${ignored}'.`);
  }

  for (const [linkA, linkB] of resolveCollisionFilterPairs(groups)) {
    const bodyA = ctx.names.resolveLink(linkA);
    const bodyB = ctx.names.resolveLink(linkB);
    if (bodyA === undefined || bodyB === undefined) {
      throw new Error(`Collision filter pair '${linkA}'/'${linkB}' refers to a link that was never committed.`);
    }
    ctx.builder.excludeCollisionsBetween(bodyA, bodyB);
  }
}

function describeSource(source: DataSource): DiagnosticOrigin {
  return source.kind === "file"
    ? { filename: path.resolve(source.path), inMemory: false }
    : { filename: IN_MEMORY_FILENAME, inMemory: true };
}

function readSourceText(source: DataSource, sink: DiagnosticSink): string | null {
  if (source.kind === "contents") return source.text;
  try {
    return fs.readFileSync(source.path, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    sink.fatal(0, `Failed to parse XML file: ${reason}`);
    return null;
  }
}

function parseInto(
  source: DataSource,
  modelName: string | null,
  workspace: ParsingWorkspace,
  options: UrdfParseOptions,
  sink: DiagnosticSink
): ModelInstanceIndex | null {
  const text = readSourceText(source, sink);
  if (text === null) return null;

  const parsed = parseXmlDocument(text);
  if (!parsed.ok) {
    sink.fatal(parsed.line, `Failed to parse XML ${source.kind === "file" ? "file" : "string"}: ${parsed.reason}`);
    return null;
  }

  const robot = parsed.document.documentElement;
  if (robot.tagName !== ROBOT_TAG) {
    sink.fatalAt(robot, "URDF does not contain a robot tag.");
    return null;
  }

  const name = modelName ? modelName : readName(robot, "name");
  if (!name) {
    sink.fatalAt(robot, "Your robot must have a name attribute or a model name must be specified.");
    return null;
  }
  if (workspace.builder.hasModelInstanceNamed(name)) {
    sink.fatalAt(robot, `A model instance named '${name}' already exists.`);
    return null;
  }

  const instance = workspace.builder.addModelInstance(name);
  const ctx: UrdfParseContext = {
    instance,
    builder: workspace.builder,
    packageMap: workspace.packageMap,
    diagnostics: sink,
    names: new NameIndex(),
    tags: vendorTags(options.vendorPrefix ?? DEFAULT_VENDOR_PREFIX),
    rootDir:
      source.kind === "file" ? path.dirname(path.resolve(source.path)) : path.resolve(options.rootDir ?? process.cwd()),
  };

  walkRobot(ctx, robot);
  applyCollisionFilterGroups(ctx);

  log.debug(`Added model '${name}' as instance ${instance}`, {
    links: ctx.names.links.size,
    joints: ctx.names.joints.size,
    errors: sink.errorCount,
    warnings: sink.warningCount,
  });
  return instance;
}

/**
 * Parses one robot description into `workspace.builder` as a new model
 * instance. `modelName` overrides the document's `<robot name>`.
 * Returns null only when the document as a whole is unusable; every other
 * problem is reported through `workspace.policy` and the walk continues.
 */
export function addModelFromUrdf(
  source: DataSource,
  modelName: string | null,
  workspace: ParsingWorkspace,
  options: UrdfParseOptions = {}
): ModelInstanceIndex | null {
  const sink = new DiagnosticSink(workspace.policy, describeSource(source));
  return parseInto(source, modelName, workspace, options, sink);
}

function parseWithRecording(source: DataSource, options: UrdfParseCallOptions): UrdfParseResult {
  const builder = options.builder ?? new RecordingModelBuilder();
  const workspace: ParsingWorkspace = {
    builder,
    packageMap: options.packageMap ?? new PackageMap(),
    policy: options.policy ?? new DiagnosticPolicy(),
  };
  const sink = new DiagnosticSink(workspace.policy, describeSource(source));
  const model = parseInto(source, options.modelName ?? null, workspace, options, sink);
  return { model, builder, diagnostics: [...sink.details] };
}

export function parseUrdfString(text: string, options: UrdfParseCallOptions = {}): UrdfParseResult {
  return parseWithRecording({ kind: "contents", text }, options);
}

export function parseUrdfFile(filePath: string, options: UrdfParseCallOptions = {}): UrdfParseResult {
  return parseWithRecording({ kind: "file", path: filePath }, options);
}
