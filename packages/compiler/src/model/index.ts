// Model public API - foundation types

// Identity - branded IDs and path normalization
export * from "./identity.js";

// Spans - source locations
export * from "./span.js";

// Chunks - configuration directive variants
export * from "./chunks.js";

// Chunk trees - ordered chunks per file
export * from "./chunk-tree.js";

// Diagnostics - foundation diagnostic types
export * from "./diagnostics.js";
