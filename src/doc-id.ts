// src/doc-id.ts: Identifier Model
// DocIds look like `T:N.Type`1`, `M:N.Type`1.Method``2(System.String,N.Other{System.Int32})`,
// `P:N.Type.Item(System.Int32)`, `F:N.Type.Field`, `E:N.Type.Changed`.

import type { DocIdKind, MemberType } from "./types.js";

const PREFIX_PATTERN = /^[TMPFEN]:/;

const KIND_BY_PREFIX: Record<string, DocIdKind> = {
  T: "Type",
  M: "Method",
  P: "Property",
  F: "Field",
  E: "Event",
};

const PREFIX_BY_MEMBER_TYPE: Record<MemberType, string> = {
  Method: "M:",
  Constructor: "M:",
  Operator: "M:",
  Property: "P:",
  Field: "F:",
  Event: "E:",
  Unknown: "M:",
};

/**
 * Kind of API the identifier names, or undefined when the prefix is unknown.
 * Constructors are methods whose name segment is `#ctor` or `#cctor`.
 */
export function kindOf(docId: string): DocIdKind | undefined {
  if (!PREFIX_PATTERN.test(docId)) return undefined;
  const kind = KIND_BY_PREFIX[docId[0]];
  if (kind === "Method" && /\.#c?ctor(\(|$)/.test(docId)) return "Constructor";
  return kind;
}

export function stripPrefix(docId: string): string {
  return PREFIX_PATTERN.test(docId) ? docId.slice(2) : docId;
}

export function prefixOf(docId: string): string {
  return PREFIX_PATTERN.test(docId) ? docId.slice(0, 2) : "";
}

/** Index of the `(` that opens the parameter list, or -1. */
function parameterListStart(docId: string): number {
  return docId.indexOf("(");
}

/** The identifier without its parameter list or conversion-operator return suffix. */
export function stripParameters(docId: string): string {
  const open = parameterListStart(docId);
  const base = open === -1 ? docId : docId.slice(0, open);
  const tilde = base.indexOf("~");
  return tilde === -1 ? base : base.slice(0, tilde);
}

/** Generic arity from the trailing backtick marker of a type name (`List`1` → 1). */
export function arityOf(typeName: string): number {
  const name = stripParameters(stripPrefix(typeName));
  const match = /(?<!`)`(\d+)$/.exec(name);
  return match ? parseInt(match[1], 10) : 0;
}

/** Generic arity of a method from its double-backtick marker (`Map``2(...)` → 2). */
export function methodArityOf(docId: string): number {
  const match = /``(\d+)$/.exec(stripParameters(docId));
  return match ? parseInt(match[1], 10) : 0;
}

/** Canonical parameter list: parenthesized, comma-separated, no spaces; empty for none. */
export function formatParameterList(types: readonly string[]): string {
  if (types.length === 0) return "";
  return `(${types.map((t) => t.replace(/\s+/g, "")).join(",")})`;
}

/**
 * Split the parameter list of a DocId at top-level commas.
 * Nesting in `{}`, `[]` and `()` is respected, so generic arguments and
 * multi-dimensional array bounds stay in one entry.
 */
export function parseParameterList(docId: string): string[] {
  const open = parameterListStart(docId);
  if (open === -1) return [];

  const params: string[] = [];
  let depth = 0;
  let current = "";
  for (let i = open + 1; i < docId.length; i++) {
    const ch = docId[i];
    if (depth === 0 && ch === ")") {
      if (current !== "") params.push(current);
      return params;
    }
    if (ch === "{" || ch === "[" || ch === "(") depth++;
    else if (ch === "}" || ch === "]" || ch === ")") depth--;

    if (depth === 0 && ch === ",") {
      params.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  return params;
}

/** Last name segment of an identifier, parameters excluded (`M:N.T.Run(System.Int32)` → `Run`). */
export function memberNameOf(docId: string): string {
  const name = stripParameters(stripPrefix(docId));
  const dot = name.lastIndexOf(".");
  return dot === -1 ? name : name.slice(dot + 1);
}

/** `T:` identifier of the type that owns a member, or undefined for types. */
export function parentTypeOf(docId: string): string | undefined {
  const kind = kindOf(docId);
  if (kind === undefined || kind === "Type") return undefined;
  const name = stripParameters(stripPrefix(docId));
  const dot = name.lastIndexOf(".");
  return dot === -1 ? undefined : `T:${name.slice(0, dot)}`;
}

/** Namespace of a type or of a member's owning type. Nested types are not distinguished. */
export function namespaceOf(docId: string): string {
  const typeId = kindOf(docId) === "Type" ? docId : parentTypeOf(docId);
  if (typeId === undefined) return "";
  const name = stripPrefix(typeId);
  const dot = name.lastIndexOf(".");
  return dot === -1 ? "" : name.slice(0, dot);
}

/**
 * Convert a declared type name to its `T:` DocId.
 * `System.Collections.Generic.Dictionary<TKey,System.Collections.Generic.List<T>>`
 * becomes `T:System.Collections.Generic.Dictionary`2`.
 */
export function typeNameToDocId(typeName: string): string {
  if (PREFIX_PATTERN.test(typeName)) return typeName;

  let result = "";
  let depth = 0;
  let args = 0;
  for (const ch of typeName.trim()) {
    if (ch === "<") {
      if (depth === 0) args = 1;
      depth++;
    } else if (ch === ">") {
      depth--;
      if (depth === 0) result += `\`${args}`;
    } else if (depth === 1 && ch === ",") {
      args++;
    } else if (depth === 0) {
      result += ch === "+" ? "." : ch;
    }
  }
  return `T:${result}`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Rewrite a declared parameter type into DocId form: generic arguments use
 * braces, by-ref markers become `@`, and generic parameter names become
 * positional markers (`` `0 `` for the type's, ``` ``0 ``` for the method's).
 */
export function toDocIdParameterType(
  type: string,
  typeTypeParameters: readonly string[] = [],
  methodTypeParameters: readonly string[] = [],
): string {
  let result = type.replace(/\s+/g, "").replace(/</g, "{").replace(/>/g, "}");
  if (result.endsWith("&")) result = `${result.slice(0, -1)}@`;

  const replaceName = (source: string, name: string, marker: string) =>
    source.replace(
      new RegExp(`(?<![\\w.\`])${escapeRegExp(name)}(?![\\w.\`])`, "g"),
      marker,
    );

  methodTypeParameters.forEach((name, i) => {
    result = replaceName(result, name, `\`\`${i}`);
  });
  typeTypeParameters.forEach((name, i) => {
    if (methodTypeParameters.includes(name)) return;
    result = replaceName(result, name, `\`${i}`);
  });
  return result;
}

export interface MemberIdParts {
  typeDocId: string;
  memberName: string;
  memberType: MemberType;
  parameterTypes?: readonly string[];
  typeTypeParameters?: readonly string[];
  methodTypeParameters?: readonly string[];
}

/**
 * Build a member DocId from the pieces a docs file declares.
 * `.ctor`/`.cctor` map to `#ctor`/`#cctor`; explicit interface names have their
 * dots replaced by `#`; a method's generic arity is appended as ``` ``N ```.
 */
export function buildMemberDocId(parts: MemberIdParts): string {
  const prefix = PREFIX_BY_MEMBER_TYPE[parts.memberType];
  const methodTypeParameters = parts.methodTypeParameters ?? [];

  let name: string;
  if (parts.memberName === ".ctor" || parts.memberName === ".cctor") {
    name = `#${parts.memberName.slice(1)}`;
  } else {
    name = parts.memberName.replace(/<.*>$/, "").replace(/\./g, "#");
  }
  if (methodTypeParameters.length > 0) name += `\`\`${methodTypeParameters.length}`;

  const params = (parts.parameterTypes ?? []).map((t) =>
    toDocIdParameterType(t, parts.typeTypeParameters, methodTypeParameters),
  );
  return `${prefix}${stripPrefix(parts.typeDocId)}.${name}${formatParameterList(params)}`;
}

/**
 * Identifier as used inside a prose cross-reference directive:
 * prefix removed, backticks escaped as `%60` and `#` as `%23`.
 */
export function toXrefId(docId: string): string {
  return stripPrefix(docId).replace(/`/g, "%60").replace(/#/g, "%23");
}
