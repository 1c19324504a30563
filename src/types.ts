// src/types.ts: Shared types for the docs porter
// Config, warnings, the run report, and the field vocabulary shared by both dialects.

export const ENGINE_VERSION = "0.1.0";

/** Sentinel text the docs repository uses for an undocumented field. */
export const TO_BE_ADDED = "To be added.";

/** True for absent, blank, or placeholder documentation text. */
export function isDocsEmpty(text: string | undefined | null): boolean {
  if (text == null) return true;
  const trimmed = text.trim();
  return trimmed === "" || trimmed === TO_BE_ADDED;
}

// ─── Configuration ───────────────────────────────────────────────────────────

export interface PortConfig {
  /** Root directories of the docs repository (target dialect). */
  docsDirs: string[];
  /** Directories holding IntelliSense xml exports (source dialect). */
  intelliSenseDirs: string[];
  /** picomatch globs, relative to each scanned directory, skipped during discovery. */
  exclude: string[];

  includedAssemblies: string[];
  excludedAssemblies: string[];
  includedNamespaces: string[];
  excludedNamespaces: string[];
  includedTypes: string[];
  excludedTypes: string[];

  portTypeSummaries: boolean;
  portTypeRemarks: boolean;
  portTypeParams: boolean;
  portTypeTypeParams: boolean;
  portMemberSummaries: boolean;
  portMemberRemarks: boolean;
  portMemberParams: boolean;
  portMemberTypeParams: boolean;
  portMemberReturns: boolean;
  portMemberProperties: boolean;
  portExceptionsNew: boolean;
  portExceptionsExisting: boolean;
  /** Word-overlap percentage above which an existing exception text is considered a duplicate. */
  exceptionCollisionThreshold: number;

  markdownRemarks: boolean;
  preserveInheritDocTag: boolean;
  skipInterfaceImplementations: boolean;
  skipInterfaceRemarks: boolean;
  disablePrompts: boolean;

  save: boolean;
  printUndoc: boolean;
  printSummaryDetails: boolean;
  verbose: boolean;
}

// ─── Warnings (threaded through every module) ───────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Documentation fields ───────────────────────────────────────────────────

export type ApiKind = "Type" | "Member";

export type DocIdKind =
  | "Type"
  | "Method"
  | "Constructor"
  | "Property"
  | "Field"
  | "Event";

export type MemberType =
  | "Method"
  | "Constructor"
  | "Property"
  | "Field"
  | "Event"
  | "Operator"
  | "Unknown";

/** A `param` or `typeparam` entry: a name and its documentation text. */
export interface NamedText {
  name: string;
  value: string;
}

/**
 * Read-only view of the documentation of one API, in either dialect.
 * The resolution engine reads candidates through this shape.
 */
export interface CommentSource {
  readonly docId: string;
  readonly summary: string;
  readonly remarks: string;
  readonly returns: string;
  readonly value: string;
  readonly params: readonly NamedText[];
  readonly typeParams: readonly NamedText[];
}

// ─── Run report ─────────────────────────────────────────────────────────────

export type ModifiedElementName =
  | "summary"
  | "remarks"
  | "returns"
  | "value"
  | "param"
  | "typeparam"
  | "exception"
  | "inheritdoc";

export interface ModifiedElement {
  docId: string;
  element: ModifiedElementName;
  /** Param, typeparam or exception cref the modification applies to. */
  name?: string;
  file: string;
  isExplicitInterface: boolean;
}

export interface PortReport {
  modifiedFiles: string[];
  modifiedTypes: string[];
  modifiedApis: string[];
  problems: string[];
  addedExceptions: string[];
  totalModifiedElements: number;
  modifications: ModifiedElement[];
  warnings: Warning[];
}

export function createReport(): PortReport {
  return {
    modifiedFiles: [],
    modifiedTypes: [],
    modifiedApis: [],
    problems: [],
    addedExceptions: [],
    totalModifiedElements: 0,
    modifications: [],
    warnings: [],
  };
}

// ─── Undocumented audit ─────────────────────────────────────────────────────

export type UndocumentedCategory =
  | "typeSummary"
  | "memberSummary"
  | "memberReturns"
  | "propertyValue"
  | "memberParam"
  | "memberTypeParam"
  | "exception";

export interface UndocumentedEntry {
  docId: string;
  category: UndocumentedCategory;
  name?: string;
}

export interface UndocumentedReport {
  entries: UndocumentedEntry[];
  counts: Record<UndocumentedCategory, number>;
}
