/**
 * HTML host documents - scripts referenced from <script src>
 */

import { parse } from "parse5";
import type { DefaultTreeAdapterMap } from "parse5";
import { resolveSpecifier } from "../resolver/scheme.js";

type P5Node = DefaultTreeAdapterMap["node"];

export const isHostDocument = (uri: string): boolean => {
  const lower = uri.toLowerCase();
  return lower.endsWith(".html") || lower.endsWith(".htm");
};

const collectScriptSources = (node: P5Node, sources: string[]): void => {
  if ("tagName" in node && node.tagName === "script") {
    const src = node.attrs.find((attr) => attr.name === "src");
    if (src !== undefined && src.value.trim() !== "") {
      sources.push(src.value.trim());
    }
  }
  if ("childNodes" in node) {
    for (const child of node.childNodes) {
      collectScriptSources(child, sources);
    }
  }
};

/**
 * Identifiers of every script a host document embeds, in document order
 */
export const extractScriptImports = (
  uri: string,
  contents: string
): readonly string[] => {
  const sources: string[] = [];
  collectScriptSources(parse(contents), sources);
  return [...new Set(sources.map((src) => resolveSpecifier(src, uri)))];
};
