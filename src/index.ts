/**
 * fncli - compile documented functions into a command line.
 * Main library exports barrel file.
 */

// Values and marshalling
export * from './core/types/index.js';
export * from './core/streams/text-streams.js';

// Specifications
export * from './core/spec/types.js';
export { buildSpec, parseCommandPath, RESERVED_PARAMS, RESERVED_COMMAND_TOKENS } from './core/spec/builder.js';
export { parseDocstring, type Docstring, type DocParam, type DocReturn } from './core/spec/docstring.js';
export { FunctionExtractor, type ExtractedFunction, type ExtractedParam } from './core/spec/extractor.js';
export { classify, assignFlags, IO_PATTERNS, type IoPattern } from './core/spec/io-patterns.js';

// Command tree and manifest
export * from './core/tree/command-tree.js';
export * from './core/manifest/manifest.js';
export * from './core/manifest/schema.js';

// Dispatch
export * from './core/dispatch/compiler.js';
export * from './core/dispatch/dispatcher.js';
export * from './core/dispatch/loader.js';
export { formatCommandListing } from './core/dispatch/command-listing.js';

// Build tool
export * from './core/build/pipeline.js';
export * from './core/config/schema.js';
export * from './core/config/loader.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
