// src/index.ts: Library API
// Two entry points: port() for directory runs, portMissingDocs() for in-memory corpora.

import { resolve } from "node:path";
import type { PortConfig } from "./types.js";
import { createConfig } from "./config.js";
import { runPort } from "./pipeline.js";
import type { RunOptions, RunResult } from "./pipeline.js";

// Re-export all public types
export type {
  PortConfig,
  PortReport,
  Warning,
  ApiKind,
  DocIdKind,
  MemberType,
  NamedText,
  CommentSource,
  ModifiedElement,
  ModifiedElementName,
  UndocumentedCategory,
  UndocumentedEntry,
  UndocumentedReport,
} from "./types.js";
export { ENGINE_VERSION, TO_BE_ADDED, isDocsEmpty, createReport } from "./types.js";

export { XmlParseError, PortAbortedError, EmptyCorpusError } from "./errors.js";

export {
  kindOf,
  stripPrefix,
  arityOf,
  methodArityOf,
  formatParameterList,
  parseParameterList,
  memberNameOf,
  parentTypeOf,
  namespaceOf,
  typeNameToDocId,
  buildMemberDocId,
  toXrefId,
} from "./doc-id.js";
export type { MemberIdParts } from "./doc-id.js";

export {
  formatAsXml,
  formatAsMarkdown,
  formatRemarks,
  toMarkdown,
  cleanInterfaceRemarks,
  explicitInterfaceDisclaimer,
} from "./markup-translator.js";

export { parseXml, serializeDocument, getInnerXml, setInnerXml } from "./xml-helper.js";

export { createIntelliSenseContainer, loadIntelliSenseDocument, loadIntelliSenseXml } from "./intellisense-xml.js";
export type { IntelliSenseContainer, IntelliSenseMember, IntelliSenseException } from "./intellisense-xml.js";

export {
  createDocsContainer,
  loadDocsDocument,
  loadDocsXml,
  lookupApi,
  membersOf,
  modifiedTypes,
  modifiedMembers,
  changedFiles,
} from "./docs-container.js";
export type { DocsContainer, DocsFile, DocsFileInfo } from "./docs-container.js";
export type { DocsApi, DocsType, DocsMember, DocsParameter, DocsTypeParameter } from "./docs-model.js";

export { portMissingDocs } from "./porter.js";
export type { PortOptions } from "./porter.js";

export { createConsoleDecisionProvider } from "./decision-provider.js";
export type { Decision, DecisionKind, DecisionProvider, DecisionRequest } from "./decision-provider.js";

export { collectUndocumented } from "./undocumented.js";
export { formatSummary, formatUndocumented } from "./summary.js";
export { discoverXmlFiles } from "./file-discovery.js";
export { readXmlFile, saveDocsFiles } from "./file-io.js";
export { createConfig, validateConfig, DEFAULTS } from "./config.js";
export { runPort, loadDocs, loadIntelliSense } from "./pipeline.js";
export type { RunOptions, RunResult } from "./pipeline.js";

/**
 * Port missing docs from the IntelliSense xml directories into the docs
 * directories. Settings not given take their defaults; files are written
 * back only when `save` is set.
 */
export async function port(
  options: Partial<PortConfig> & Pick<PortConfig, "docsDirs" | "intelliSenseDirs" | "includedAssemblies">,
  runOptions: RunOptions = {},
): Promise<RunResult> {
  const config = createConfig({
    ...options,
    docsDirs: options.docsDirs.map((p) => resolve(p)),
    intelliSenseDirs: options.intelliSenseDirs.map((p) => resolve(p)),
  });
  return runPort(config, runOptions);
}
