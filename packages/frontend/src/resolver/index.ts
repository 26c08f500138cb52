/**
 * Resolvers - Public API
 */

export type { ResolvedSource, UriResolver } from "./types.js";
export {
  RUNTIME_SCHEME,
  PACKAGE_SCHEME,
  FILE_SCHEME,
  getScheme,
  hasScheme,
  filePathOf,
  toFileUri,
  resolveSpecifier,
} from "./scheme.js";
export { createFileResolver, readSourceFile } from "./file-resolver.js";
export { MockRuntimeLibrary, type MockRuntimeOptions } from "./mock-runtime.js";
export {
  RUNTIME_MANIFEST,
  discoverRuntimeLayout,
  type RuntimeLayout,
} from "./runtime-layout.js";
export {
  DirectoryRuntimeLibrary,
  createMockRuntimeResolver,
  createRuntimePathResolver,
} from "./runtime-library.js";
export { packageRelativePath } from "./package-path.js";
export {
  createPackageResolver,
  createPackageResolverFor,
} from "./package-resolver.js";
export { createMultiPackageResolver } from "./multi-package-resolver.js";
export { MemoryFileSystem } from "./memory-file-system.js";
export {
  IMPLICIT_ENTRY_FILE,
  createImplicitEntryDocument,
  createImplicitEntryResolver,
  getImplicitEntryPath,
  getImplicitEntryUri,
} from "./implicit-entry.js";
export {
  composeResolvers,
  createSourceFactory,
  type ResolverChain,
  type SourceFactory,
} from "./source-factory.js";
