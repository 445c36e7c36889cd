export {
  addModelFromUrdf,
  parseUrdfFile,
  parseUrdfString,
  type ParsingWorkspace,
  type UrdfParseCallOptions,
  type UrdfParseResult,
} from "./app/core/urdf/urdfParser";
export { DEFAULT_VENDOR_PREFIX, type UrdfParseOptions } from "./app/core/urdf/urdfParseOptions";
export {
  DiagnosticError,
  DiagnosticPolicy,
  formatDiagnostic,
  IN_MEMORY_FILENAME,
  type DiagnosticAction,
  type DiagnosticCategory,
  type DiagnosticDetail,
  type DiagnosticSeverity,
} from "./app/core/urdf/diagnostics";
export {
  findUnknownIgnoredGroups,
  resolveCollisionFilterPairs,
  type CollisionFilterPair,
} from "./app/core/urdf/collisionFilterGroups";
export { JOINT_TYPES, lookupJointType, type JointTypeHandler } from "./app/core/urdf/joints/jointTypes";
export { PackageMap, resolveResourceUri, type ResolvedResource } from "./app/core/loaders/packageMap";
export { RecordingModelBuilder } from "./app/core/model/RecordingModelBuilder";
export * from "./app/core/model/types";
export * from "./app/core/urdf/urdfModel";
export {
  addLogSink,
  createScopedLogger,
  log,
  logDebug,
  logError,
  logInfo,
  logWarn,
  setConsoleLogging,
  type LogSink,
} from "./app/core/services/logger";
export { consoleStore, selectVisibleEntries, type LogEntry, type LogLevel } from "./app/core/store/consoleStore";
