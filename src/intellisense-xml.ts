// src/intellisense-xml.ts: Source container: IntelliSense xml exports
// `<doc><assembly><name/></assembly><members><member name="DocId">…</member></members></doc>`.
// Members are immutable once loaded; the first definition of a DocId wins.

import { isApiIncluded } from "./api-filter.js";
import { kindOf } from "./doc-id.js";
import { XmlParseError } from "./errors.js";
import {
  attributeValue,
  childElements,
  descendantElement,
  elementText,
  firstChildElement,
  getInnerXml,
  parseXml,
} from "./xml-helper.js";
import type { CommentSource, NamedText, PortConfig, Warning } from "./types.js";

export interface IntelliSenseException {
  cref: string;
  value: string;
}

export interface IntelliSenseMember extends CommentSource {
  readonly assembly: string;
  readonly file: string;
  readonly exceptions: readonly IntelliSenseException[];
  readonly inheritDoc: boolean;
  readonly inheritDocCref?: string;
}

export interface IntelliSenseContainer {
  members: Map<string, IntelliSenseMember>;
}

export function createIntelliSenseContainer(): IntelliSenseContainer {
  return { members: new Map() };
}

function namedChildren(el: Element, tag: string): NamedText[] {
  return childElements(el, tag).map((child) => ({
    name: attributeValue(child, "name"),
    value: getInnerXml(child),
  }));
}

/** Read one `<member>` element. */
export function readIntelliSenseMember(
  el: Element,
  assembly: string,
  file: string,
): IntelliSenseMember {
  const inheritDoc = firstChildElement(el, "inheritdoc");
  const inheritDocCref = inheritDoc?.getAttribute("cref") || undefined;
  return {
    docId: attributeValue(el, "name"),
    assembly,
    file,
    summary: getInnerXml(firstChildElement(el, "summary")),
    remarks: getInnerXml(firstChildElement(el, "remarks")),
    returns: getInnerXml(firstChildElement(el, "returns")),
    value: getInnerXml(firstChildElement(el, "value")),
    params: namedChildren(el, "param"),
    typeParams: namedChildren(el, "typeparam"),
    exceptions: childElements(el, "exception").map((ex) => ({
      cref: attributeValue(ex, "cref"),
      value: getInnerXml(ex),
    })),
    inheritDoc: inheritDoc !== undefined,
    inheritDocCref,
  };
}

/**
 * Add the members of a parsed IntelliSense document to the container.
 * Returns the number of members added.
 */
export function loadIntelliSenseDocument(
  container: IntelliSenseContainer,
  doc: Document,
  file: string,
  config: PortConfig,
  warnings: Warning[] = [],
): number {
  const root = doc.documentElement;
  if (root.tagName !== "doc") {
    warnings.push({
      level: "warn",
      module: "intellisense",
      message: `Root element is <${root.tagName}>, expected <doc>; file skipped`,
      file,
    });
    return 0;
  }

  const assembly = elementText(descendantElement(root, ["assembly", "name"]));
  if (assembly === "") {
    warnings.push({
      level: "warn",
      module: "intellisense",
      message: "No assembly name; file skipped",
      file,
    });
    return 0;
  }

  const membersEl = firstChildElement(root, "members");
  if (!membersEl) return 0;

  let added = 0;
  for (const el of childElements(membersEl, "member")) {
    const docId = attributeValue(el, "name");
    if (kindOf(docId) === undefined) {
      warnings.push({
        level: "warn",
        module: "intellisense",
        message: `Member with unrecognized DocId "${docId}" skipped`,
        file,
      });
      continue;
    }
    if (!isApiIncluded(docId, [assembly], config)) continue;

    const existing = container.members.get(docId);
    if (existing) {
      warnings.push({
        level: "warn",
        module: "intellisense",
        message: `Duplicate DocId ${docId} ignored (first defined in ${existing.file})`,
        file,
      });
      continue;
    }

    container.members.set(docId, readIntelliSenseMember(el, assembly, file));
    added++;
  }
  return added;
}

/**
 * Parse and load IntelliSense xml text. A document that fails to parse is
 * reported as an error warning and skipped.
 */
export function loadIntelliSenseXml(
  container: IntelliSenseContainer,
  text: string,
  file: string,
  config: PortConfig,
  warnings: Warning[] = [],
): number {
  let doc: Document;
  try {
    doc = parseXml(text, file);
  } catch (err) {
    if (!(err instanceof XmlParseError)) throw err;
    warnings.push({ level: "error", module: "intellisense", message: err.message, file });
    return 0;
  }
  return loadIntelliSenseDocument(container, doc, file, config, warnings);
}
