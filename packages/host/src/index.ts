// Host package public API
//
// Node.js entry points around @strata/compiler: file system access,
// configuration files and whole-project compilation.

export { createNodeFileProvider } from "./node-provider.js";
export { createConsoleLogger } from "./logger.js";
export { formatDiagnostic, hostDiagnostic, type HostDiagCode } from "./diagnostics.js";

// === Options ===
export {
  normalizeOptions,
  DEFAULT_CONCURRENCY,
  DEFAULT_EXCLUDED_DIRECTORIES,
  DEFAULT_PAGE_EXTENSION,
  type NormalizeOptionsContext,
  type ResolvedStrataOptions,
  type StrataOptions,
} from "./options.js";

// === Config files ===
export { loadConfigFile, mergeConfigs, parseConfig, CONFIG_FILE_NAME, type StrataConfig } from "./config-file.js";

// === Projects ===
export {
  compileProject,
  discoverPages,
  resolveProjectOptions,
  type CompileProjectOptions,
  type DiscoverPagesOptions,
  type PageOutcome,
  type ProjectCompileResult,
  type ProjectSummary,
} from "./project.js";
