/**
 * Identifiers an import specifier may stand for, in the order they are
 * tried. `./util.js` is written for `util.ts`; `./util` and a bare
 * package name leave the extension or the index file implied.
 */

const KNOWN_EXTENSION = /\.(?:[cm]?[jt]sx?|html?)$/;

export const importCandidates = (uri: string): readonly string[] => {
  if (uri.endsWith("/")) {
    return [`${uri}index.ts`];
  }
  if (uri.endsWith(".js")) {
    return [uri, `${uri.slice(0, -".js".length)}.ts`];
  }
  if (KNOWN_EXTENSION.test(uri)) {
    return [uri];
  }
  return [uri, `${uri}.ts`, `${uri}.tsx`, `${uri}/index.ts`];
};
