/**
 * Library resolution - Public API
 */

export type {
  DeclarationKind,
  ImportBinding,
  InferredDeclaration,
  LibraryProgram,
  LibraryResolver,
  LibraryUnit,
  LibraryUnitKind,
  ReExport,
} from "./types.js";
export {
  LibraryResolverWithInference,
  createInferenceLibraryResolverFactory,
} from "./library-resolver.js";
export {
  UNKNOWN_TYPE,
  inferDeclarations,
  inferExpressionType,
} from "./inference.js";
export { parseScript, type ParsedScript } from "./script.js";
export { extractScriptImports, isHostDocument } from "./host-document.js";
export { UnitCache } from "./unit-cache.js";
