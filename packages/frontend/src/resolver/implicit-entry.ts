/**
 * Implicit entry document
 *
 * Some analyses only reach scripts from a root host document. When enabled,
 * a synthetic HTML page embedding the entry point is served from memory at
 * a well-known path. It is added to the chain in front of the file resolver;
 * every other file: identifier still reaches the disk.
 */

import * as path from "node:path";
import { MemoryFileSystem } from "./memory-file-system.js";
import { toFileUri } from "./scheme.js";
import type { UriResolver } from "./types.js";

export const IMPLICIT_ENTRY_FILE = "__implicit_entry__.html";

const escapeAttribute = (value: string): string =>
  value.replace(/&/g, "&amp;").replace(/"/g, "&quot;");

/**
 * Absolute path of the synthetic entry document
 */
export const getImplicitEntryPath = (cwd: string = process.cwd()): string =>
  path.resolve(cwd, IMPLICIT_ENTRY_FILE);

/**
 * Identifier of the synthetic entry document
 */
export const getImplicitEntryUri = (cwd: string = process.cwd()): string =>
  toFileUri(getImplicitEntryPath(cwd));

/**
 * Host document with exactly one script reference to the absolute entry path
 */
export const createImplicitEntryDocument = (entryPointFile: string): string =>
  `<body><script type="module" src="${escapeAttribute(entryPointFile)}"></script></body>`;

export const createImplicitEntryResolver = (
  entryPointFile: string,
  cwd: string = process.cwd()
): UriResolver =>
  new MemoryFileSystem([
    [
      getImplicitEntryPath(cwd),
      createImplicitEntryDocument(path.resolve(cwd, entryPointFile)),
    ],
  ]).createResolver("implicit-entry");
