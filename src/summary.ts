// src/summary.ts: Text rendering of the run report and the undocumented audit

import { UNDOCUMENTED_CATEGORIES, UNDOCUMENTED_LABELS } from "./undocumented.js";
import type { ModifiedElement, PortReport, UndocumentedCategory, UndocumentedReport } from "./types.js";

function section(lines: string[], title: string, items: readonly string[], details: boolean): void {
  lines.push(`${title}: ${items.length}`);
  if (details) {
    for (const item of items) lines.push(`    - ${item}`);
  }
}

function describeModification(m: ModifiedElement): string[] {
  const element = m.name !== undefined ? `${m.element} '${m.name}'` : m.element;
  const lines = [`    File: ${m.file}`, `        DocID: ${m.docId}`, `        Modified element: ${element}`];
  if (m.isExplicitInterface) lines.push("        Ported as explicit interface implementation");
  return lines;
}

/**
 * Final summary of a run. With `details`, every modified element and every
 * list entry is printed as well.
 */
export function formatSummary(report: PortReport, details = false): string {
  const lines: string[] = [];

  if (details && report.modifications.length > 0) {
    lines.push("Modified elements:");
    for (const m of report.modifications) lines.push(...describeModification(m));
    lines.push("");
  }

  section(lines, "Total modified files", report.modifiedFiles, details);
  section(lines, "Total modified types", report.modifiedTypes, details);
  section(lines, "Total modified APIs", report.modifiedApis, details);
  section(lines, "Total problematic APIs", report.problems, details);
  section(lines, "Total added exceptions", report.addedExceptions, details);
  lines.push(`Total modified individual elements: ${report.totalModifiedElements}`);

  return lines.join("\n");
}

const CATEGORY_TITLES: Record<UndocumentedCategory, string> = {
  typeSummary: "Type Summary",
  memberSummary: "Member Summary",
  memberReturns: "Method Returns",
  propertyValue: "Property Value",
  memberParam: "Member Param",
  memberTypeParam: "Member Type Param",
  exception: "Member Exception",
};

/** Undocumented APIs grouped by DocId, followed by the per-category counts. */
export function formatUndocumented(undoc: UndocumentedReport): string {
  const lines: string[] = ["Undocumented APIs:"];
  let current: string | undefined;

  for (const entry of undoc.entries) {
    if (entry.docId !== current) {
      lines.push(`    ${entry.docId}`);
      current = entry.docId;
    }
    const title = CATEGORY_TITLES[entry.category];
    lines.push(entry.name !== undefined ? `        ${title}: ${entry.name}` : `        ${title}`);
  }

  for (const category of UNDOCUMENTED_CATEGORIES) {
    lines.push(`Undocumented ${UNDOCUMENTED_LABELS[category]}: ${undoc.counts[category]}`);
  }
  return lines.join("\n");
}
