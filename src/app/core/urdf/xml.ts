import { DOMParser } from "@xmldom/xmldom";
import type { DiagnosticSink } from "./diagnostics";
import { zeroPose, type Pose, type Vec3 } from "./urdfModel";

const ELEMENT_NODE = 1;
const LOCATION_RE = /#\[line:(\d+),col:[^\]]*\]/;

export type XmlParseOutcome = { ok: true; document: Document } | { ok: false; reason: string; line: number };

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/** Line recorded by the DOM locator, or 0 when the node has none. */
export function sourceLine(node: Node) {
  return "lineNumber" in node && typeof node.lineNumber === "number" ? node.lineNumber : 0;
}

// "[xmldom warning]\t<text>\n@#[line:3,col:5]" -> { reason: "<text>", line: 3 }
function describeParseProblem(raw: string) {
  const location = LOCATION_RE.exec(raw);
  const reason = raw
    .replace(/^\[xmldom \w+\]\s*/, "")
    .replace(/\s*@[^\n]*#\[line:\d+,col:[^\]]*\]\s*$/, "")
    .trim();
  return { reason, line: location ? Number(location[1]) : 0 };
}

export function parseXmlDocument(text: string): XmlParseOutcome {
  const problems: string[] = [];
  const record = (message: string) => {
    problems.push(message);
  };
  const parser = new DOMParser({
    locator: {},
    // Several well-formedness violations only reach the warning callback.
    errorHandler: { warning: record, error: record, fatalError: record },
  });

  let document: Document;
  try {
    document = parser.parseFromString(text, "text/xml");
  } catch (error) {
    return { ok: false, ...describeParseProblem(error instanceof Error ? error.message : String(error)) };
  }
  if (problems.length > 0) return { ok: false, ...describeParseProblem(problems[0]) };
  if (!document.documentElement) return { ok: false, reason: "document has no root element", line: 0 };
  return { ok: true, document };
}

export function childElements(parent: Element, tagName?: string): Element[] {
  const found: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i += 1) {
    const node = parent.childNodes[i];
    if (isElement(node) && (tagName === undefined || node.tagName === tagName)) found.push(node);
  }
  return found;
}

export function childElement(parent: Element, tagName: string): Element | null {
  return childElements(parent, tagName)[0] ?? null;
}

export function readAttribute(el: Element, name: string): string | null {
  return el.hasAttribute(name) ? el.getAttribute(name) : null;
}

/** Attribute used as an identifier; an empty value counts as missing. */
export function readName(el: Element, name: string): string | null {
  const value = readAttribute(el, name);
  return value ? value : null;
}

export function missingAttributeMessage(el: Element, name: string, owner?: string) {
  return `Missing required attribute '${name}' on <${el.tagName}>${owner ? ` of ${owner}` : ""}.`;
}

export function parseNumberList(text: string): number[] | null {
  const values = text
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .map((token) => {
      const lowered = token.toLowerCase();
      if (lowered === "inf" || lowered === "+inf") return Infinity;
      if (lowered === "-inf") return -Infinity;
      return Number(token);
    });
  return values.some((value) => Number.isNaN(value)) ? null : values;
}

export function readNumberAttribute(sink: DiagnosticSink, el: Element, name: string, fallback: number): number | null {
  const raw = readAttribute(el, name);
  if (raw === null) return fallback;
  const values = parseNumberList(raw);
  if (!values || values.length !== 1) {
    sink.error(el, `Expected a number for attribute '${name}' of <${el.tagName}>, got '${raw}'.`);
    return null;
  }
  return values[0];
}

export function readRequiredNumber(sink: DiagnosticSink, el: Element, name: string, owner?: string): number | null {
  if (!el.hasAttribute(name)) {
    sink.error(el, missingAttributeMessage(el, name, owner));
    return null;
  }
  return readNumberAttribute(sink, el, name, 0);
}

export function readNumberTuple(
  sink: DiagnosticSink,
  el: Element,
  name: string,
  count: number,
  fallback: number[]
): number[] | null {
  const raw = readAttribute(el, name);
  if (raw === null) return fallback;
  const values = parseNumberList(raw);
  if (!values || values.length !== count) {
    sink.error(el, `Expected ${count} values for attribute '${name}' of <${el.tagName}>, got '${raw}'.`);
    return null;
  }
  return values;
}

export function readVec3Attribute(sink: DiagnosticSink, el: Element, name: string, fallback: Vec3): Vec3 | null {
  const values = readNumberTuple(sink, el, name, 3, fallback);
  return values ? [values[0], values[1], values[2]] : null;
}

export function readRequiredVec3(sink: DiagnosticSink, el: Element, name: string, owner?: string): Vec3 | null {
  if (!el.hasAttribute(name)) {
    sink.error(el, missingAttributeMessage(el, name, owner));
    return null;
  }
  return readVec3Attribute(sink, el, name, [0, 0, 0]);
}

export function readBooleanAttribute(sink: DiagnosticSink, el: Element, name: string, fallback: boolean): boolean | null {
  const raw = readAttribute(el, name);
  if (raw === null) return fallback;
  const lowered = raw.trim().toLowerCase();
  if (lowered === "true" || lowered === "1") return true;
  if (lowered === "false" || lowered === "0") return false;
  sink.error(el, `Expected a boolean for attribute '${name}' of <${el.tagName}>, got '${raw}'.`);
  return null;
}

/** `xyz`/`rpy` read from `el` itself; absent attributes are zero. */
export function readPoseAttributes(sink: DiagnosticSink, el: Element): Pose | null {
  const xyz = readVec3Attribute(sink, el, "xyz", [0, 0, 0]);
  if (!xyz) return null;
  const rpy = readVec3Attribute(sink, el, "rpy", [0, 0, 0]);
  if (!rpy) return null;
  return { xyz, rpy };
}

/** Pose of the `<origin>` child of `parent`; zero when there is none. */
export function readOrigin(sink: DiagnosticSink, parent: Element): Pose | null {
  const origin = childElement(parent, "origin");
  if (!origin) return zeroPose();
  return readPoseAttributes(sink, origin);
}
