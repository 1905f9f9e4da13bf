// Shared compiler infrastructure
//
// Cross-cutting utilities used by multiple layers.
// IMPORTANT: This module only imports from model/ - no other compiler layers.

// Diagnostics
export {
  buildDiagnostic,
  hasErrors,
  withSeverity,
  type DiagnosticSeverity,
  type DiagnosticStage,
  type DiagnosticRelated,
  type BuildDiagnosticInput,
  type CompilerDiagnostic,
} from "./diagnostics.js";

// Values with their diagnostics (Diagnosed<T>)
export {
  type Diagnosed,
  withDiags,
} from "./diagnosed.js";

// Contract errors (thrown, never diagnostics)
export {
  ContractError,
  ContractErrorCode,
  isContractError,
  type ContractErrorCodeType,
} from "./errors.js";

// Stable hashing
export { stableHash } from "./hash.js";

// Logging
export { nullLogger, type Logger } from "./logger.js";

// Debug channels
export {
  debug,
  configureDebug,
  refreshDebugChannels,
  type DebugChannelName,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
} from "./debug.js";
