// Compiler package public API
//
// This barrel exports the page compiler and the layers it is built from.
// Import from here rather than deep paths for stability.

// === Facade ===
export {
  createPageCompiler,
  normalizePageCompilerOptions,
  DEFAULT_IMPORTS_FILE_NAME,
  DEFAULT_TARGET_NAMESPACE,
  DEFAULT_MODEL_TYPE,
  type PageCompiler,
  type PageCompilerOptions,
  type PageCompileResult,
  type ResolvedPageCompilerOptions,
} from "./facade.js";

// === Model ===
export {
  // Identity
  normalizePathForId,
  isNormalizedPath,
  parentDirectory,
  joinPath,
  baseName,
  rootRelativePath,
  brandString,
  // Spans
  sourceSpan,
  spanLength,
  lineColumnAt,
  // Chunks
  MODEL_TOKEN,
  namespaceImport,
  setBaseType,
  inject,
  addTagHelper,
  removeTagHelper,
  opaque,
  isChunkOfKind,
  isTagHelperDirective,
  substituteModelToken,
  // Chunk trees
  DEFAULTS_TREE_ID,
  createChunkTree,
  chunksOfKind,
} from "./model/index.js";
export type {
  NormalizedPath,
  StringId,
  TextSpan,
  SourceSpan,
  Chunk,
  ChunkKind,
  ChunkOfKind,
  NamespaceImportChunk,
  SetBaseTypeChunk,
  InjectChunk,
  AddTagHelperChunk,
  RemoveTagHelperChunk,
  TagHelperDirectiveChunk,
  OpaqueChunk,
  ChunkTree,
  ChunkTreeId,
  ParseDiagCode,
  ResolveDiagCode,
  EmitDiagCode,
} from "./model/index.js";

// === IO ===
export { createMemoryFileProvider } from "./io/index.js";
export type { FileContentProvider, StalenessToken, MemoryFileProvider, MemoryFileProviderOptions } from "./io/index.js";

// === Parsing ===
export {
  parseTemplate,
  directiveParser,
  DIRECTIVE_TAGS,
  MARKUP_DIRECTIVE,
  MODEL_DIRECTIVE,
  isTypeExpression,
  isIdentifierName,
  isNamespaceName,
} from "./parsing/index.js";
export type { ParseResult, TemplateParser } from "./parsing/index.js";

// === Inheritance ===
export {
  ChunkTreeCache,
  AncestorChainResolver,
  computeAncestorChain,
  mergeChunkTrees,
  flattenEffectiveTree,
  fingerprintEffectiveTree,
  DEFAULT_INHERITED_CHUNKS,
  RUNTIME_NAMESPACE,
} from "./inheritance/index.js";
export type {
  CacheRequestOptions,
  ChunkTreeCacheOptions,
  ChunkTreeCacheStats,
  ChunkTreeLookup,
  ChunkTreeLookupStatus,
  AncestorChainOptions,
  ChainEntryResult,
  ChainResolution,
  EffectiveChunkTree,
  MergeLayer,
} from "./inheritance/index.js";

// === Emit ===
export {
  generatePageModule,
  referenceGenerator,
  sanitizeClassName,
  sanitizeIdentifier,
  resolveModelType,
  substituteModelType,
  resolveTagHelperLog,
  LineWriter,
} from "./emit/index.js";
export type { CodeGenerator, GeneratedCode, NamingContext, TagHelperResolution, SpanMapping } from "./emit/index.js";

// === Shared infrastructure ===
export {
  buildDiagnostic,
  hasErrors,
  withSeverity,
  withDiags,
  ContractError,
  ContractErrorCode,
  isContractError,
  stableHash,
  nullLogger,
  debug,
  configureDebug,
  refreshDebugChannels,
} from "./shared/index.js";
export type {
  CompilerDiagnostic,
  DiagnosticSeverity,
  DiagnosticStage,
  DiagnosticRelated,
  BuildDiagnosticInput,
  Diagnosed,
  ContractErrorCodeType,
  Logger,
  DebugChannel,
  DebugChannelName,
  DebugConfig,
} from "./shared/index.js";
