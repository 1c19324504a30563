// src/pipeline.ts: Run Orchestrator
// discover → load both corpora → port → save → audit

import type { PortConfig, PortReport, UndocumentedReport, Warning } from "./types.js";
import { discoverXmlFiles } from "./file-discovery.js";
import { readXmlFile, saveDocsFiles } from "./file-io.js";
import type { XmlFileText } from "./file-io.js";
import { createIntelliSenseContainer, loadIntelliSenseXml } from "./intellisense-xml.js";
import type { IntelliSenseContainer } from "./intellisense-xml.js";
import { createDocsContainer, loadDocsXml } from "./docs-container.js";
import type { DocsContainer } from "./docs-container.js";
import { portMissingDocs } from "./porter.js";
import type { DecisionProvider } from "./decision-provider.js";
import { collectUndocumented } from "./undocumented.js";

/** Verbose logger; writes to stderr only when verbose is enabled. */
function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

export interface RunOptions {
  decisions?: DecisionProvider;
  warnings?: Warning[];
}

export interface RunResult {
  report: PortReport;
  source: IntelliSenseContainer;
  docs: DocsContainer;
  /** Docs files written back; empty unless `save` is on. */
  saved: string[];
  undocumented?: UndocumentedReport;
}

function readAll(files: string[], module: string, warnings: Warning[]): XmlFileText[] {
  const result: XmlFileText[] = [];
  for (const file of files) {
    try {
      result.push(readXmlFile(file));
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({ level: "error", module, message: `Cannot read file: ${msg}`, file });
    }
  }
  return result;
}

/** Discover and load the IntelliSense xml files under the configured directories. */
export function loadIntelliSense(config: PortConfig, warnings: Warning[] = []): IntelliSenseContainer {
  const container = createIntelliSenseContainer();
  const files = discoverXmlFiles(config.intelliSenseDirs, config.exclude, warnings);
  vlog(config.verbose, `Found ${files.length} IntelliSense xml file(s)`);
  for (const { path, text } of readAll(files, "intellisense", warnings)) {
    loadIntelliSenseXml(container, text, path, config, warnings);
  }
  vlog(config.verbose, `  Loaded ${container.members.size} IntelliSense member(s)`);
  return container;
}

/** Discover and load the docs xml files under the configured directories. */
export function loadDocs(config: PortConfig, warnings: Warning[] = []): DocsContainer {
  const container = createDocsContainer();
  const files = discoverXmlFiles(config.docsDirs, config.exclude, warnings);
  vlog(config.verbose, `Found ${files.length} docs xml file(s)`);
  for (const { path, text, hasBom, crlf } of readAll(files, "docs", warnings)) {
    loadDocsXml(container, text, { path, hasBom, crlf }, config, warnings);
  }
  vlog(
    config.verbose,
    `  Loaded ${container.types.size} type(s) and ${container.members.size} member(s)`,
  );
  return container;
}

/**
 * Run a full port over the configured directories.
 * EmptyCorpusError and PortAbortedError propagate; nothing is saved then.
 */
export async function runPort(config: PortConfig, options: RunOptions = {}): Promise<RunResult> {
  const warnings = options.warnings ?? [];
  const startTime = performance.now();

  const source = loadIntelliSense(config, warnings);
  const docs = loadDocs(config, warnings);

  vlog(config.verbose, "Porting missing documentation...");
  const report = await portMissingDocs(source, docs, config, {
    decisions: options.decisions,
    warnings,
  });
  vlog(config.verbose, `  ${report.totalModifiedElements} element(s) modified`);

  let saved: string[] = [];
  if (config.save) {
    saved = saveDocsFiles(docs, warnings);
    vlog(config.verbose, `  Saved ${saved.length} file(s)`);
  }

  const undocumented = config.printUndoc ? collectUndocumented(docs) : undefined;

  vlog(config.verbose, `Done in ${Math.round(performance.now() - startTime)}ms`);
  return { report, source, docs, saved, undocumented };
}
