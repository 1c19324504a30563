// src/xml-helper.ts: DOM parsing, serialization and in-place editing
// Output follows the docs repository conventions: `<name />` for empty elements,
// double-quoted attributes, CDATA sections written back untouched.

import { DOMParser } from "@xmldom/xmldom";
import { XmlParseError } from "./errors.js";

// Node type codes (the DOM globals are not available under Node).
export const ELEMENT_NODE = 1;
export const TEXT_NODE = 3;
export const CDATA_SECTION_NODE = 4;
export const PROCESSING_INSTRUCTION_NODE = 7;
export const COMMENT_NODE = 8;
export const DOCUMENT_NODE = 9;

/**
 * Parse a whole document. Any error or fatal error reported by the parser,
 * or a missing root element, throws XmlParseError.
 */
export function parseXml(text: string, file?: string): Document {
  const errors: string[] = [];
  const parser = new DOMParser({
    errorHandler: (level: string, message: unknown) => {
      if (level !== "warning") errors.push(String(message).split("\n")[0]);
    },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(text, "text/xml");
  } catch (err) {
    throw new XmlParseError(err instanceof Error ? err.message : String(err), file);
  }

  if (errors.length > 0) throw new XmlParseError(errors[0], file);
  if (!doc.documentElement) throw new XmlParseError("document has no root element", file);
  return doc;
}

export function isElement(node: Node | null | undefined): node is Element {
  return node != null && node.nodeType === ELEMENT_NODE;
}

function isText(node: Node): node is Text {
  return node.nodeType === TEXT_NODE;
}

function isProcessingInstruction(node: Node): node is ProcessingInstruction {
  return node.nodeType === PROCESSING_INSTRUCTION_NODE;
}

// ─── Navigation ─────────────────────────────────────────────────────────────

export function childElements(parent: Element, name?: string): Element[] {
  const result: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i++) {
    const child = parent.childNodes[i];
    if (isElement(child) && (name === undefined || child.tagName === name)) {
      result.push(child);
    }
  }
  return result;
}

export function firstChildElement(parent: Element, name: string): Element | undefined {
  return childElements(parent, name)[0];
}

/** Walk a path of child element names (`["ReturnValue", "ReturnType"]`). */
export function descendantElement(parent: Element, path: readonly string[]): Element | undefined {
  let current: Element | undefined = parent;
  for (const name of path) {
    if (!current) return undefined;
    current = firstChildElement(current, name);
  }
  return current;
}

/** Concatenated text of all descendant text and CDATA nodes, trimmed. */
export function elementText(el: Element | undefined): string {
  if (!el) return "";
  let text = "";
  const visit = (node: Node) => {
    if (node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE) {
      text += node.nodeValue ?? "";
    }
    if (!isElement(node)) return;
    for (let i = 0; i < node.childNodes.length; i++) visit(node.childNodes[i]);
  };
  visit(el);
  return text.trim();
}

export function attributeValue(el: Element | undefined, name: string): string {
  return el?.getAttribute(name) ?? "";
}

// ─── Serialization ──────────────────────────────────────────────────────────

export function escapeText(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function escapeAttribute(text: string): string {
  return escapeText(text).replace(/"/g, "&quot;");
}

export function serializeNode(node: Node): string {
  if (isElement(node)) return serializeElement(node);
  if (isProcessingInstruction(node)) {
    return node.data ? `<?${node.target} ${node.data}?>` : `<?${node.target}?>`;
  }
  switch (node.nodeType) {
    case TEXT_NODE:
      return escapeText(node.nodeValue ?? "");
    case CDATA_SECTION_NODE:
      return `<![CDATA[${node.nodeValue ?? ""}]]>`;
    case COMMENT_NODE:
      return `<!--${node.nodeValue ?? ""}-->`;
    case DOCUMENT_NODE:
      return serializeChildren(node);
    default:
      return "";
  }
}

function serializeElement(el: Element): string {
  let open = `<${el.tagName}`;
  for (let i = 0; i < el.attributes.length; i++) {
    const attr = el.attributes.item(i);
    if (attr) open += ` ${attr.name}="${escapeAttribute(attr.value)}"`;
  }
  if (el.childNodes.length === 0) return `${open} />`;
  return `${open}>${serializeChildren(el)}</${el.tagName}>`;
}

export function serializeChildren(node: Node): string {
  let out = "";
  for (let i = 0; i < node.childNodes.length; i++) out += serializeNode(node.childNodes[i]);
  return out;
}

export function serializeDocument(doc: Document): string {
  return serializeChildren(doc);
}

// ─── Inner XML ──────────────────────────────────────────────────────────────

/**
 * The markup inside an element as one string: line endings normalized,
 * every line trimmed, surrounding whitespace removed.
 */
export function getInnerXml(el: Element | undefined): string {
  if (!el) return "";
  return serializeChildren(el)
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .trim();
}

/**
 * Replace an element's children with the nodes of an XML fragment.
 * Text that is not well-formed markup is stored as a single text node.
 */
export function setInnerXml(el: Element, xml: string): void {
  while (el.firstChild) el.removeChild(el.firstChild);
  if (xml === "") return;

  const doc = el.ownerDocument;
  let fragment: Element | undefined;
  try {
    fragment = parseXml(`<root>${xml}</root>`).documentElement;
  } catch (err) {
    if (!(err instanceof XmlParseError)) throw err;
    fragment = undefined;
  }

  if (!fragment) {
    el.appendChild(doc.createTextNode(xml));
    return;
  }
  for (let i = 0; i < fragment.childNodes.length; i++) {
    el.appendChild(doc.importNode(fragment.childNodes[i], true));
  }
}

// ─── Formatted editing ──────────────────────────────────────────────────────

/** Whitespace after the last newline of the text node preceding an element. */
export function indentationOf(el: Element): string {
  const prev = el.previousSibling;
  if (!prev || !isText(prev)) return "";
  const text = prev.nodeValue ?? "";
  const newline = text.lastIndexOf("\n");
  if (newline === -1) return "";
  const indent = text.slice(newline + 1);
  return /^[ \t]*$/.test(indent) ? indent : "";
}

/**
 * Append a child element on its own line, after the last element child and
 * with the same indentation. An empty parent gets one level deeper than itself.
 */
export function appendFormatted(parent: Element, child: Element): Element {
  const doc = parent.ownerDocument;
  const siblings = childElements(parent);
  const last = siblings[siblings.length - 1];

  if (last) {
    const ref = last.nextSibling;
    parent.insertBefore(doc.createTextNode(`\n${indentationOf(last)}`), ref);
    parent.insertBefore(child, ref);
    return child;
  }

  const parentIndent = indentationOf(parent);
  while (parent.firstChild) parent.removeChild(parent.firstChild);
  parent.appendChild(doc.createTextNode(`\n${parentIndent}  `));
  parent.appendChild(child);
  parent.appendChild(doc.createTextNode(`\n${parentIndent}`));
  return child;
}

/** Create an element with attributes and optional inner XML, then append it formatted. */
export function appendElement(
  parent: Element,
  name: string,
  attributes: Record<string, string> = {},
  innerXml = "",
): Element {
  const el = parent.ownerDocument.createElement(name);
  for (const [key, value] of Object.entries(attributes)) el.setAttribute(key, value);
  setInnerXml(el, innerXml);
  return appendFormatted(parent, el);
}
