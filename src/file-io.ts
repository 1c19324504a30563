// src/file-io.ts: Reading and saving xml files
// The docs repository mixes BOM and line-ending conventions; both are
// detected on read and restored on save.

import { readFileSync, writeFileSync } from "node:fs";
import type { DocsContainer } from "./docs-container.js";
import { changedFiles } from "./docs-container.js";
import { serializeDocument } from "./xml-helper.js";
import type { Warning } from "./types.js";

const BOM = "\uFEFF";

export interface XmlFileText {
  path: string;
  /** File contents without BOM and with `\n` line endings. */
  text: string;
  hasBom: boolean;
  crlf: boolean;
}

export function decodeXmlText(path: string, raw: string): XmlFileText {
  const hasBom = raw.startsWith(BOM);
  const body = hasBom ? raw.slice(BOM.length) : raw;
  const crlf = body.includes("\r\n");
  return { path, text: crlf ? body.replace(/\r\n/g, "\n") : body, hasBom, crlf };
}

export function encodeXmlText(text: string, hasBom: boolean, crlf: boolean): string {
  const body = crlf ? text.replace(/\r?\n/g, "\r\n") : text;
  return hasBom ? BOM + body : body;
}

export function readXmlFile(path: string): XmlFileText {
  return decodeXmlText(path, readFileSync(path, "utf-8"));
}

/**
 * Write back every docs file holding a changed type or member.
 * Returns the paths written. A failed write becomes an error warning.
 */
export function saveDocsFiles(container: DocsContainer, warnings: Warning[] = []): string[] {
  const written: string[] = [];
  for (const file of changedFiles(container)) {
    const content = encodeXmlText(serializeDocument(file.document), file.hasBom, file.crlf);
    try {
      writeFileSync(file.path, content, "utf-8");
      written.push(file.path);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({
        level: "error",
        module: "file-io",
        message: `Failed to save: ${msg}`,
        file: file.path,
      });
    }
  }
  return written;
}
