import { logError, logWarn } from "../services/logger";
import { sourceLine } from "./xml";

export type DiagnosticSeverity = "error" | "warning";

/** structural: the parse aborts. semantic: one element is dropped. advisory: a warning. */
export type DiagnosticCategory = "structural" | "semantic" | "advisory";

export type DiagnosticDetail = {
  severity: DiagnosticSeverity;
  category: DiagnosticCategory;
  filename: string;
  line: number;
  message: string;
};

export type DiagnosticAction = (detail: DiagnosticDetail) => void;

export const IN_MEMORY_FILENAME = "<literal-string>.urdf";

export function formatDiagnostic(detail: DiagnosticDetail) {
  return `${detail.filename}:${detail.line}: ${detail.severity}: ${detail.message}`;
}

export class DiagnosticError extends Error {
  readonly detail: DiagnosticDetail;

  constructor(detail: DiagnosticDetail) {
    super(formatDiagnostic(detail));
    this.name = "DiagnosticError";
    this.detail = detail;
  }
}

const logErrorAction: DiagnosticAction = (detail) => logError(formatDiagnostic(detail), { scope: "urdf" });
const logWarningAction: DiagnosticAction = (detail) => logWarn(formatDiagnostic(detail), { scope: "urdf" });
const throwAction: DiagnosticAction = (detail) => {
  throw new DiagnosticError(detail);
};

/**
 * Caller-owned routing of diagnostics. Passing `null` to a setter restores the
 * logging default.
 */
export class DiagnosticPolicy {
  private errorAction: DiagnosticAction = logErrorAction;
  private warningAction: DiagnosticAction = logWarningAction;

  static throwing() {
    const policy = new DiagnosticPolicy();
    policy.setActionForErrors(throwAction);
    return policy;
  }

  setActionForErrors(action: DiagnosticAction | null) {
    this.errorAction = action ?? logErrorAction;
  }

  setActionForWarnings(action: DiagnosticAction | null) {
    this.warningAction = action ?? logWarningAction;
  }

  error(detail: DiagnosticDetail) {
    this.errorAction(detail);
  }

  warning(detail: DiagnosticDetail) {
    this.warningAction(detail);
  }
}

export type ElementFailure = { status: "error" };
export type ElementSkip = { status: "skipped" };
export type ElementResult<T> = { status: "ok"; spec: T } | ElementFailure | ElementSkip;

export const ok = <T>(spec: T): ElementResult<T> => ({ status: "ok", spec });

export const FAILED: ElementFailure = { status: "error" };
export const SKIPPED: ElementSkip = { status: "skipped" };

export function isElementFailure(value: unknown): value is ElementFailure {
  return typeof value === "object" && value !== null && "status" in value && value.status === "error";
}

export type DiagnosticOrigin = { filename: string; inMemory: boolean };

/**
 * Per-parse recorder. Stamps each message with the origin's filename and the
 * element's line, keeps it, and hands it to the policy immediately.
 */
export class DiagnosticSink {
  private readonly recorded: DiagnosticDetail[] = [];

  constructor(
    private readonly policy: DiagnosticPolicy,
    readonly origin: DiagnosticOrigin
  ) {}

  get details(): readonly DiagnosticDetail[] {
    return this.recorded;
  }

  get errorCount() {
    return this.recorded.filter((detail) => detail.severity === "error").length;
  }

  get warningCount() {
    return this.recorded.filter((detail) => detail.severity === "warning").length;
  }

  error(node: Node | null, message: string) {
    this.emit("error", "semantic", this.lineOf(node), message);
  }

  warning(node: Node | null, message: string) {
    this.emit("warning", "advisory", this.lineOf(node), message);
  }

  /** Records a structural error; `line` is used as given for file-backed sources. */
  fatal(line: number, message: string) {
    this.emit("error", "structural", this.origin.inMemory ? 1 : line, message);
  }

  fatalAt(node: Node | null, message: string) {
    this.emit("error", "structural", this.lineOf(node), message);
  }

  fail(node: Node | null, message: string): ElementFailure {
    this.error(node, message);
    return FAILED;
  }

  skip(node: Node | null, message: string): ElementSkip {
    this.warning(node, message);
    return SKIPPED;
  }

  private lineOf(node: Node | null) {
    if (this.origin.inMemory) return 1;
    return node ? sourceLine(node) : 0;
  }

  private emit(severity: DiagnosticSeverity, category: DiagnosticCategory, line: number, message: string) {
    const detail: DiagnosticDetail = { severity, category, filename: this.origin.filename, line, message };
    this.recorded.push(detail);
    if (severity === "error") this.policy.error(detail);
    else this.policy.warning(detail);
  }
}
