// src/api-filter.ts: Assembly, namespace and type inclusion policy
// A pattern matches a dotted name exactly, as a segment prefix
// (`System.IO` covers `System.IO.Pipes`), or as a picomatch glob.

import picomatch from "picomatch";
import { kindOf, namespaceOf, parentTypeOf, stripPrefix } from "./doc-id.js";
import type { PortConfig } from "./types.js";

const GLOB_CHARS = /[*?[\]{}!]/;

export function matchesNamePattern(name: string, pattern: string): boolean {
  if (pattern === "") return false;
  if (GLOB_CHARS.test(pattern)) return picomatch.isMatch(name, pattern);
  return name === pattern || name.startsWith(`${pattern}.`);
}

function matchesAny(name: string, patterns: readonly string[]): boolean {
  return patterns.some((p) => matchesNamePattern(name, p));
}

type FilterConfig = Pick<
  PortConfig,
  | "includedAssemblies"
  | "excludedAssemblies"
  | "includedNamespaces"
  | "excludedNamespaces"
  | "includedTypes"
  | "excludedTypes"
>;

/** An assembly participates when it is included and not excluded. */
export function isAssemblyIncluded(assembly: string, config: FilterConfig): boolean {
  return (
    matchesAny(assembly, config.includedAssemblies) &&
    !matchesAny(assembly, config.excludedAssemblies)
  );
}

/**
 * Whether an API takes part in the run. Any one of its assemblies must pass
 * the assembly filter; empty namespace and type include lists admit everything.
 */
export function isApiIncluded(
  docId: string,
  assemblies: readonly string[],
  config: FilterConfig,
): boolean {
  if (!assemblies.some((a) => isAssemblyIncluded(a, config))) return false;

  const namespace = namespaceOf(docId);
  if (config.includedNamespaces.length > 0 && !matchesAny(namespace, config.includedNamespaces)) {
    return false;
  }
  if (matchesAny(namespace, config.excludedNamespaces)) return false;

  const typeId = kindOf(docId) === "Type" ? docId : parentTypeOf(docId);
  const typeName = typeId ? stripPrefix(typeId) : "";
  if (config.includedTypes.length > 0 && !matchesAny(typeName, config.includedTypes)) {
    return false;
  }
  return !matchesAny(typeName, config.excludedTypes);
}
