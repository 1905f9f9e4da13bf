export type { FileContentProvider, StalenessToken } from "./file-provider.js";
export {
  createMemoryFileProvider,
  type MemoryFileProvider,
  type MemoryFileProviderOptions,
} from "./memory-provider.js";
