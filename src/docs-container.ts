// src/docs-container.ts: Target container: docs repository type files
// One `<Type>` document per file. Types and members are indexed by DocId in
// load order; each member also hangs off its owning type.

import { isApiIncluded } from "./api-filter.js";
import {
  buildMemberDocId,
  formatParameterList,
  parseParameterList,
  typeNameToDocId,
} from "./doc-id.js";
import {
  readAssemblies,
  readDocIdSignature,
  readParameters,
  readReturnType,
  readTypeParameters,
  toMemberType,
} from "./docs-model.js";
import type { DocsApi, DocsMember, DocsType } from "./docs-model.js";
import { XmlParseError } from "./errors.js";
import {
  attributeValue,
  childElements,
  descendantElement,
  elementText,
  firstChildElement,
  indentationOf,
  parseXml,
} from "./xml-helper.js";
import type { PortConfig, Warning } from "./types.js";

export interface DocsFile {
  path: string;
  document: Document;
  hasBom: boolean;
  crlf: boolean;
}

export interface DocsContainer {
  types: Map<string, DocsType>;
  members: Map<string, DocsMember>;
  membersByType: Map<string, DocsMember[]>;
  files: Map<string, DocsFile>;
}

export interface DocsFileInfo {
  path: string;
  hasBom?: boolean;
  crlf?: boolean;
}

export function createDocsContainer(): DocsContainer {
  return {
    types: new Map(),
    members: new Map(),
    membersByType: new Map(),
    files: new Map(),
  };
}

/** Find or create the `Docs` child, placed before `Members` when there is one. */
function ensureDocsElement(el: Element): Element {
  const existing = firstChildElement(el, "Docs");
  if (existing) return existing;

  const doc = el.ownerDocument;
  const docs = doc.createElement("Docs");
  const members = firstChildElement(el, "Members");
  if (members) {
    const indent = indentationOf(members);
    el.insertBefore(docs, members);
    el.insertBefore(doc.createTextNode(`\n${indent}`), members);
  } else {
    el.appendChild(docs);
  }
  return docs;
}

/** An API read from its element, before its `Docs` block is looked up or created. */
type UnattachedApi<T extends DocsApi> = Omit<T, "docsElement">;

function readType(root: Element, file: string): UnattachedApi<DocsType> {
  const fullName = attributeValue(root, "FullName");
  const signature = readDocIdSignature(root, "TypeSignature");
  const interfaces = firstChildElement(root, "Interfaces");
  return {
    kind: "Type",
    docId: signature !== "" ? signature : typeNameToDocId(fullName),
    name: attributeValue(root, "Name"),
    fullName,
    file,
    element: root,
    assemblies: readAssemblies(root),
    baseTypeName: elementText(descendantElement(root, ["Base", "BaseTypeName"])),
    interfaceNames: interfaces
      ? childElements(interfaces, "Interface")
          .map((i) => elementText(firstChildElement(i, "InterfaceName")))
          .filter((name) => name !== "")
      : [],
    parameters: readParameters(root),
    typeParameters: readTypeParameters(root),
    returnType: readReturnType(root),
    changed: false,
  };
}

function readMember(el: Element, parentType: DocsType, file: string): UnattachedApi<DocsMember> {
  const memberName = attributeValue(el, "MemberName");
  const memberType = toMemberType(elementText(firstChildElement(el, "MemberType")));
  const parameters = readParameters(el);
  const typeParameters = readTypeParameters(el);
  const signature = readDocIdSignature(el, "MemberSignature");
  const assemblies = readAssemblies(el);

  return {
    kind: "Member",
    docId:
      signature !== ""
        ? signature
        : buildMemberDocId({
            typeDocId: parentType.docId,
            memberName,
            memberType,
            parameterTypes: parameters.map((p) => p.type),
            typeTypeParameters: parentType.typeParameters.map((tp) => tp.name),
            methodTypeParameters: typeParameters.map((tp) => tp.name),
          }),
    memberName,
    memberType,
    parentType,
    file,
    element: el,
    assemblies: assemblies.length > 0 ? assemblies : parentType.assemblies,
    implementsInterfaceMember: elementText(
      descendantElement(el, ["Implements", "InterfaceMember"]),
    ),
    parameters,
    typeParameters,
    returnType: readReturnType(el),
    changed: false,
  };
}

/**
 * Add the type and members of a parsed docs document. Documents whose root
 * is not `<Type>` (namespace and index files) are skipped.
 * Returns the number of APIs added.
 */
export function loadDocsDocument(
  container: DocsContainer,
  doc: Document,
  info: DocsFileInfo,
  config: PortConfig,
  warnings: Warning[] = [],
): number {
  const file = info.path;
  const root = doc.documentElement;
  if (root.tagName !== "Type") {
    warnings.push({
      level: "info",
      module: "docs",
      message: `Not a type document (<${root.tagName}>); skipped`,
      file,
    });
    return 0;
  }

  const read = readType(root, file);
  if (read.docId === "T:") {
    warnings.push({ level: "warn", module: "docs", message: "Type has no DocId; skipped", file });
    return 0;
  }
  if (!isApiIncluded(read.docId, read.assemblies, config)) return 0;

  const existing = container.types.get(read.docId);
  if (existing) {
    warnings.push({
      level: "warn",
      module: "docs",
      message: `Duplicate type ${read.docId} ignored (first defined in ${existing.file})`,
      file,
    });
    return 0;
  }

  const type: DocsType = { ...read, docsElement: ensureDocsElement(root) };

  container.types.set(type.docId, type);
  container.files.set(file, {
    path: file,
    document: doc,
    hasBom: info.hasBom ?? false,
    crlf: info.crlf ?? false,
  });

  const typeMembers: DocsMember[] = [];
  container.membersByType.set(type.docId, typeMembers);
  let added = 1;

  const membersEl = firstChildElement(root, "Members");
  for (const el of membersEl ? childElements(membersEl, "Member") : []) {
    const fields = readMember(el, type, file);

    const duplicate = container.members.get(fields.docId);
    if (duplicate) {
      warnings.push({
        level: "warn",
        module: "docs",
        message: `Duplicate member ${fields.docId} ignored (first defined in ${duplicate.file})`,
        file,
      });
      continue;
    }
    const member: DocsMember = { ...fields, docsElement: ensureDocsElement(el) };

    const declared = parseParameterList(member.docId);
    if (member.parameters.length !== declared.length) {
      warnings.push({
        level: "info",
        module: "docs",
        message:
          `${member.docId} declares ${member.parameters.length} parameter(s) ` +
          `but its DocId lists ${declared.length} ${formatParameterList(declared) || "()"}`,
        file,
      });
    }

    container.members.set(member.docId, member);
    typeMembers.push(member);
    added++;
  }
  return added;
}

/**
 * Parse and load docs xml text. A document that fails to parse is reported
 * as an error warning and skipped.
 */
export function loadDocsXml(
  container: DocsContainer,
  text: string,
  info: DocsFileInfo,
  config: PortConfig,
  warnings: Warning[] = [],
): number {
  let doc: Document;
  try {
    doc = parseXml(text, info.path);
  } catch (err) {
    if (!(err instanceof XmlParseError)) throw err;
    warnings.push({ level: "error", module: "docs", message: err.message, file: info.path });
    return 0;
  }
  return loadDocsDocument(container, doc, info, config, warnings);
}

// ─── Queries ────────────────────────────────────────────────────────────────

export function membersOf(container: DocsContainer, typeDocId: string): DocsMember[] {
  return container.membersByType.get(typeDocId) ?? [];
}

export function lookupApi(container: DocsContainer, docId: string): DocsApi | undefined {
  return container.types.get(docId) ?? container.members.get(docId);
}

export function modifiedTypes(container: DocsContainer): DocsType[] {
  return [...container.types.values()].filter((t) => t.changed);
}

export function modifiedMembers(container: DocsContainer): DocsMember[] {
  return [...container.members.values()].filter((m) => m.changed);
}

/** Files holding at least one changed type or member, in load order. */
export function changedFiles(container: DocsContainer): DocsFile[] {
  const paths = new Set<string>();
  for (const api of [...modifiedTypes(container), ...modifiedMembers(container)]) {
    paths.add(api.file);
  }
  return [...container.files.values()].filter((f) => paths.has(f.path));
}
