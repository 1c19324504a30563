// src/docs-model.ts: Target fragments over the docs repository DOM
// A DocsType or DocsMember keeps references into its document; reads go
// through the `Docs` element and writes edit it in place and set `changed`.

import {
  appendElement,
  attributeValue,
  childElements,
  descendantElement,
  elementText,
  firstChildElement,
  getInnerXml,
  setInnerXml,
} from "./xml-helper.js";
import { isDocsEmpty } from "./types.js";
import type { CommentSource, MemberType, NamedText } from "./types.js";

export interface DocsParameter {
  name: string;
  type: string;
}

export interface DocsTypeParameter {
  name: string;
  constraintsParameterAttributes: string[];
  constraintsBaseTypeName: string;
}

/** A `param`, `typeparam` or `exception` entry of a `Docs` block. */
export interface DocsEntry {
  /** The `name` attribute, or the `cref` attribute for exceptions. */
  name: string;
  element: Element;
}

interface DocsApiBase {
  docId: string;
  file: string;
  element: Element;
  docsElement: Element;
  assemblies: string[];
  parameters: DocsParameter[];
  typeParameters: DocsTypeParameter[];
  returnType: string;
  changed: boolean;
}

export interface DocsType extends DocsApiBase {
  kind: "Type";
  name: string;
  fullName: string;
  baseTypeName: string;
  interfaceNames: string[];
}

export interface DocsMember extends DocsApiBase {
  kind: "Member";
  memberName: string;
  memberType: MemberType;
  parentType: DocsType;
  implementsInterfaceMember: string;
}

export type DocsApi = DocsType | DocsMember;

export type DocsTextField = "summary" | "remarks" | "returns" | "value";

const MEMBER_TYPES: readonly MemberType[] = [
  "Method",
  "Constructor",
  "Property",
  "Field",
  "Event",
  "Operator",
];

export function toMemberType(text: string): MemberType {
  return MEMBER_TYPES.find((t) => t === text) ?? "Unknown";
}

// ─── Structural metadata ────────────────────────────────────────────────────

export function readAssemblies(el: Element): string[] {
  return childElements(el, "AssemblyInfo")
    .flatMap((info) => childElements(info, "AssemblyName"))
    .map((name) => elementText(name))
    .filter((name) => name !== "");
}

export function readParameters(el: Element): DocsParameter[] {
  const container = firstChildElement(el, "Parameters");
  if (!container) return [];
  return childElements(container, "Parameter").map((p) => ({
    name: attributeValue(p, "Name"),
    type: attributeValue(p, "Type"),
  }));
}

export function readTypeParameters(el: Element): DocsTypeParameter[] {
  const container = firstChildElement(el, "TypeParameters");
  if (!container) return [];
  return childElements(container, "TypeParameter").map((tp) => {
    const constraints = firstChildElement(tp, "Constraints");
    return {
      name: attributeValue(tp, "Name"),
      constraintsParameterAttributes: constraints
        ? childElements(constraints, "ParameterAttribute").map((a) => getInnerXml(a))
        : [],
      constraintsBaseTypeName: elementText(
        constraints ? firstChildElement(constraints, "BaseTypeName") : undefined,
      ),
    };
  });
}

export function readReturnType(el: Element): string {
  return elementText(descendantElement(el, ["ReturnValue", "ReturnType"]));
}

/** `DocId` signature value of a Type or Member element, or "" when absent. */
export function readDocIdSignature(el: Element, signatureTag: string): string {
  const signature = childElements(el, signatureTag).find(
    (s) => attributeValue(s, "Language") === "DocId",
  );
  return attributeValue(signature, "Value");
}

export function isProperty(api: DocsApi): boolean {
  return api.kind === "Member" && api.memberType === "Property";
}

export function isMethod(api: DocsApi): boolean {
  return api.kind === "Member" && (api.memberType === "Method" || api.memberType === "Operator");
}

/** Enum fields: the docs build rejects remarks on them. */
export function isEnumField(api: DocsApi): boolean {
  return (
    api.kind === "Member" &&
    api.memberType === "Field" &&
    api.parentType.baseTypeName === "System.Enum"
  );
}

export function isDelegateType(api: DocsApi): boolean {
  return api.kind === "Type" && api.baseTypeName === "System.Delegate";
}

// ─── Docs fields ────────────────────────────────────────────────────────────

export function getField(api: DocsApi, field: DocsTextField): string {
  return getInnerXml(firstChildElement(api.docsElement, field));
}

/** Write a text field, creating its element when the `Docs` block lacks one. */
export function setField(api: DocsApi, field: DocsTextField, xml: string): void {
  const el = firstChildElement(api.docsElement, field);
  if (el) setInnerXml(el, xml);
  else appendElement(api.docsElement, field, {}, xml);
  api.changed = true;
}

export function getParams(api: DocsApi): DocsEntry[] {
  return namedEntries(api, "param", "name");
}

export function getTypeParams(api: DocsApi): DocsEntry[] {
  return namedEntries(api, "typeparam", "name");
}

export function getExceptions(api: DocsApi): DocsEntry[] {
  return namedEntries(api, "exception", "cref");
}

function namedEntries(api: DocsApi, tag: string, attribute: string): DocsEntry[] {
  return childElements(api.docsElement, tag).map((element) => ({
    name: attributeValue(element, attribute),
    element,
  }));
}

export function entryValue(entry: DocsEntry): string {
  return getInnerXml(entry.element);
}

export function setEntryValue(api: DocsApi, entry: DocsEntry, xml: string): void {
  setInnerXml(entry.element, xml);
  api.changed = true;
}

// ─── Exceptions ─────────────────────────────────────────────────────────────

export function addException(api: DocsApi, cref: string, xml: string): DocsEntry {
  const element = appendElement(api.docsElement, "exception", { cref }, xml);
  api.changed = true;
  return { name: cref, element };
}

/** Append an alternative to an existing exception, separated by an `-or-` paragraph. */
export function appendExceptionText(api: DocsApi, entry: DocsEntry, xml: string): void {
  const current = entryValue(entry);
  const combined = isDocsEmpty(current) ? xml : `${current}\n\n-or-\n\n${xml}`;
  setEntryValue(api, entry, combined);
}

function wordCounts(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const word of text.split(/[ '"\r\n.,;:]+/)) {
    if (word === "") continue;
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }
  return counts;
}

/**
 * True when the incoming text repeats the existing one: the share of its
 * distinct words already present at least as often in the existing text
 * exceeds `threshold` percent. Text with no words always collides.
 */
export function wordCountCollidesAboveThreshold(
  existing: string,
  incoming: string,
  threshold: number,
): boolean {
  const source = wordCounts(incoming);
  if (source.size === 0) return true;
  const docs = wordCounts(existing);

  let collisions = 0;
  for (const [word, count] of source) {
    if ((docs.get(word) ?? 0) >= count) collisions++;
  }
  return (collisions * 100) / source.size > threshold;
}

// ─── Inherit-doc marker ─────────────────────────────────────────────────────

export function getInheritDoc(api: DocsApi): { cref?: string } | undefined {
  const el = firstChildElement(api.docsElement, "inheritdoc");
  if (!el) return undefined;
  const cref = el.getAttribute("cref");
  return cref ? { cref } : {};
}

/**
 * Ensure an `inheritdoc` marker exists, carrying `cref` when given.
 * Returns false when the marker was already there as requested.
 */
export function setInheritDoc(api: DocsApi, cref: string | undefined): boolean {
  const el = firstChildElement(api.docsElement, "inheritdoc");
  if (!el) {
    appendElement(api.docsElement, "inheritdoc", cref ? { cref } : {});
    api.changed = true;
    return true;
  }
  if (cref && el.getAttribute("cref") !== cref) {
    el.setAttribute("cref", cref);
    api.changed = true;
    return true;
  }
  return false;
}

// ─── Views ──────────────────────────────────────────────────────────────────

function namedTexts(entries: DocsEntry[]): NamedText[] {
  return entries.map((e) => ({ name: e.name, value: entryValue(e) }));
}

/** Snapshot of an API's current docs, read the same way as a source fragment. */
export function commentsOf(api: DocsApi): CommentSource {
  return {
    docId: api.docId,
    summary: getField(api, "summary"),
    remarks: getField(api, "remarks"),
    returns: getField(api, "returns"),
    value: getField(api, "value"),
    params: namedTexts(getParams(api)),
    typeParams: namedTexts(getTypeParams(api)),
  };
}
