// src/undocumented.ts: Audit of docs fields still empty after a run

import type { DocsContainer } from "./docs-container.js";
import {
  entryValue,
  getExceptions,
  getField,
  getParams,
  getTypeParams,
  isMethod,
  isProperty,
} from "./docs-model.js";
import { TO_BE_ADDED, isDocsEmpty } from "./types.js";
import type { UndocumentedCategory, UndocumentedEntry, UndocumentedReport } from "./types.js";

export const UNDOCUMENTED_CATEGORIES: readonly UndocumentedCategory[] = [
  "typeSummary",
  "memberSummary",
  "memberReturns",
  "propertyValue",
  "memberParam",
  "memberTypeParam",
  "exception",
];

export const UNDOCUMENTED_LABELS: Record<UndocumentedCategory, string> = {
  typeSummary: "type summaries",
  memberSummary: "member summaries",
  memberReturns: "method returns",
  propertyValue: "property values",
  memberParam: "member params",
  memberTypeParam: "member type params",
  exception: "exceptions",
};

/**
 * List every type summary, member summary, param, type param and exception
 * that is still empty, plus property values and method returns that still
 * hold the placeholder.
 */
export function collectUndocumented(docs: DocsContainer): UndocumentedReport {
  const entries: UndocumentedEntry[] = [];

  for (const type of docs.types.values()) {
    if (isDocsEmpty(getField(type, "summary"))) {
      entries.push({ docId: type.docId, category: "typeSummary" });
    }
  }

  for (const member of docs.members.values()) {
    if (isDocsEmpty(getField(member, "summary"))) {
      entries.push({ docId: member.docId, category: "memberSummary" });
    }
    // Missing `value`/`returns` elements are legitimate; only the placeholder counts.
    if (isProperty(member) && getField(member, "value") === TO_BE_ADDED) {
      entries.push({ docId: member.docId, category: "propertyValue" });
    } else if (isMethod(member) && getField(member, "returns") === TO_BE_ADDED) {
      entries.push({ docId: member.docId, category: "memberReturns" });
    }
    for (const param of getParams(member)) {
      if (isDocsEmpty(entryValue(param))) {
        entries.push({ docId: member.docId, category: "memberParam", name: param.name });
      }
    }
    for (const typeParam of getTypeParams(member)) {
      if (isDocsEmpty(entryValue(typeParam))) {
        entries.push({ docId: member.docId, category: "memberTypeParam", name: typeParam.name });
      }
    }
    for (const exception of getExceptions(member)) {
      if (isDocsEmpty(entryValue(exception))) {
        entries.push({ docId: member.docId, category: "exception", name: exception.name });
      }
    }
  }

  const counts: Record<UndocumentedCategory, number> = {
    typeSummary: 0,
    memberSummary: 0,
    memberReturns: 0,
    propertyValue: 0,
    memberParam: 0,
    memberTypeParam: 0,
    exception: 0,
  };
  for (const entry of entries) counts[entry.category]++;

  return { entries, counts };
}
