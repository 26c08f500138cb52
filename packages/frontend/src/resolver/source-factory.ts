/**
 * Source factory - the composed resolver chain
 *
 * Dispatch is first-match-by-scheme: the first resolver whose canResolve
 * claims an identifier answers for it, and its failure is final. Later
 * resolvers are never consulted for an identifier already claimed.
 */

import { Result, ok, error } from "../types/result.js";
import { Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { getScheme } from "./scheme.js";
import type { ResolvedSource, UriResolver } from "./types.js";

export type SourceFactory = {
  readonly resolvers: readonly UriResolver[];
  readonly findResolver: (uri: string) => UriResolver | undefined;
  readonly resolve: (uri: string) => Result<ResolvedSource, Diagnostic>;
  readonly describe: () => readonly string[];
};

export type ResolverChain = {
  readonly runtimeResolver: UriResolver;
  readonly implicitEntryResolver?: UriResolver;
  readonly fileResolvers: readonly UriResolver[];
};

/**
 * Order a resolver chain: runtime library first, then the implicit entry
 * document when present, then the file resolvers as given
 */
export const composeResolvers = (
  chain: ResolverChain
): readonly UriResolver[] => {
  const resolvers: UriResolver[] = [chain.runtimeResolver];
  if (chain.implicitEntryResolver !== undefined) {
    resolvers.push(chain.implicitEntryResolver);
  }
  resolvers.push(...chain.fileResolvers);
  return Object.freeze(resolvers);
};

export const createSourceFactory = (
  resolvers: readonly UriResolver[]
): Result<SourceFactory, Diagnostic> => {
  if (resolvers.length === 0) {
    return error(
      createDiagnostic(
        "UG3004",
        "error",
        "A source factory needs at least one resolver"
      )
    );
  }

  const entries = Object.freeze([...resolvers]);
  const names = Object.freeze(entries.map((resolver) => resolver.name));

  const findResolver = (uri: string): UriResolver | undefined =>
    entries.find((resolver) => resolver.canResolve(uri));

  return ok(
    Object.freeze({
      resolvers: entries,
      findResolver,
      describe: () => names,
      resolve: (uri: string): Result<ResolvedSource, Diagnostic> => {
        const resolver = findResolver(uri);
        if (resolver === undefined) {
          const scheme = getScheme(uri);
          return error(
            createDiagnostic(
              "UG2002",
              "error",
              scheme === undefined
                ? `Identifier has no scheme: "${uri}"`
                : `No resolver handles the '${scheme}' scheme: "${uri}"`,
              undefined,
              `Resolver chain: ${names.join(", ")}`
            )
          );
        }
        return resolver.resolve(uri);
      },
    })
  );
};
