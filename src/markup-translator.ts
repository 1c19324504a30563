// src/markup-translator.ts: Inline markup rewriting between the two dialects
// Structured output keeps XML tags (primitive crefs qualified, self-closing tags
// normalized). Prose output turns references into xref directives and code
// literals, wrapped in a markdown format block for remarks.

import { toXrefId } from "./doc-id.js";
import type { ApiKind } from "./types.js";

/** Built-in aliases and the runtime type each one names. */
export const PRIMITIVE_TYPES: Readonly<Record<string, string>> = {
  bool: "System.Boolean",
  byte: "System.Byte",
  sbyte: "System.SByte",
  char: "System.Char",
  decimal: "System.Decimal",
  double: "System.Double",
  float: "System.Single",
  int: "System.Int32",
  uint: "System.UInt32",
  nint: "System.IntPtr",
  nuint: "System.UIntPtr",
  long: "System.Int64",
  ulong: "System.UInt64",
  short: "System.Int16",
  ushort: "System.UInt16",
  object: "System.Object",
  string: "System.String",
};

/** Alias with no underlying runtime type; always rendered as a reserved word. */
export const DYNAMIC_ALIAS = "dynamic";

const SELF_CLOSING = /\s*\/>/g;
const SEE_CREF = /<(see|seealso)\s+cref="([^"]*)"\s*\/>/g;
const SEE_CREF_WITH_TEXT = /<(?:see|seealso)\s+cref="([^"]*)"\s*>([\s\S]*?)<\/(?:see|seealso)>/g;
const SEE_LANGWORD = /<see\s+langword="([^"]*)"\s*\/>/g;
const PARAM_REF = /<(?:paramref|typeparamref)\s+name="([^"]*)"\s*\/>/g;
const CODE_INLINE = /<c>([\s\S]*?)<\/c>/g;
const PARA = /<\/?para\s*>/g;
const MARKDOWN_BLOCK = /<format\s+type="text\/markdown"\s*>\s*<!\[CDATA\[([\s\S]*?)\]\]>\s*<\/format>/;
const REMARKS_HEADER = /^\s*##\s*Remarks\s*/;

function hasOwn(map: Readonly<Record<string, string>>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, key);
}

/**
 * A newline not preceded by `.`, `:` or another newline, and not followed by
 * a newline, is a wrapped line: it becomes a space. Paragraph breaks stay.
 */
export function removeUndesiredEndlines(text: string): string {
  return text.replace(/(?<![.:\n])\n(?!\n)/g, " ");
}

/** Structured-XML rendering of a fragment of source markup. */
export function formatAsXml(text: string, removeEndlines = false): string {
  let result = text.replace(SELF_CLOSING, " />");
  result = result.replace(SEE_CREF, (match, tag: string, cref: string) => {
    if (cref === DYNAMIC_ALIAS) return `<see langword="${DYNAMIC_ALIAS}" />`;
    if (hasOwn(PRIMITIVE_TYPES, cref)) return `<${tag} cref="T:${PRIMITIVE_TYPES[cref]}" />`;
    return match;
  });
  return removeEndlines ? removeUndesiredEndlines(result) : result;
}

function decodeEntities(text: string): string {
  return text
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, "&");
}

function xrefOrCode(cref: string): string {
  if (cref === DYNAMIC_ALIAS || hasOwn(PRIMITIVE_TYPES, cref)) return `\`${cref}\``;
  return `<xref:${toXrefId(cref)}>`;
}

/** Prose rendering of inline markup, without the remarks wrapper. */
export function toMarkdown(text: string): string {
  const existing = MARKDOWN_BLOCK.exec(text);
  const body = existing ? existing[1].replace(REMARKS_HEADER, "") : text;

  const converted = body
    .replace(SEE_CREF_WITH_TEXT, (_m, cref: string, label: string) =>
      `[${label.trim()}](xref:${toXrefId(cref)})`,
    )
    .replace(SEE_CREF, (_m, _tag: string, cref: string) => xrefOrCode(cref))
    .replace(SEE_LANGWORD, (_m, word: string) => `\`${word}\``)
    .replace(PARAM_REF, (_m, name: string) => `\`${name}\``)
    .replace(CODE_INLINE, (_m, code: string) => `\`${code}\``)
    .replace(PARA, "\n\n")
    .replace(/\n{3,}/g, "\n\n");

  return decodeEntities(converted).trim();
}

/**
 * Remarks wrapped for the docs repository: a markdown format block holding
 * a raw-content section with the `## Remarks` header. Indentation matches the
 * nesting depth of the remarks element (types sit two levels shallower).
 */
export function formatAsMarkdown(text: string, kind: ApiKind): string {
  const remarksIndent = kind === "Member" ? " ".repeat(8) : " ".repeat(4);
  const formatIndent = kind === "Member" ? " ".repeat(10) : " ".repeat(6);
  const markdown = toMarkdown(text);
  return (
    `\n${formatIndent}<format type="text/markdown"><![CDATA[\n\n## Remarks\n\n` +
    `${markdown}\n\n${formatIndent}]]></format>\n${remarksIndent}`
  );
}

/** Render remarks in the configured dialect. */
export function formatRemarks(text: string, kind: ApiKind, markdown: boolean): string {
  return markdown ? formatAsMarkdown(text, kind) : formatAsXml(text, true);
}

/**
 * Remarks of an interface member reduced to plain lines: markdown headers,
 * format wrappers and raw-content markers removed, blank lines dropped.
 */
export function cleanInterfaceRemarks(remarks: string): string {
  return remarks
    .replace(/##\s?Remarks/g, "")
    .replace(/<format\s+type="text\/markdown"\s*>/g, "")
    .replace(/<\/format>/g, "")
    .replace(/<!\[CDATA\[/g, "")
    .replace(/\]\]>/g, "")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "")
    .join("\n");
}

/**
 * Disclaimer for an explicit interface implementation, as source markup.
 * The remarks formatter turns the references into xref directives in prose mode.
 */
export function explicitInterfaceDisclaimer(typeDocId: string, interfaceDocId: string): string {
  return (
    `This member is an explicit interface member implementation. ` +
    `It can be used only when the <see cref="${typeDocId}" /> instance is cast to an ` +
    `<see cref="${interfaceDocId}" /> interface.`
  );
}

/** Exception text: structured rendering with `-or-` alternatives on their own paragraphs. */
export function formatExceptionText(text: string): string {
  return formatAsXml(text, true).replace(/\s*-or-\s*/g, "\n\n-or-\n\n").trim();
}
