#!/usr/bin/env node
// CLI entry point for apidocs-porter

import {
  ENGINE_VERSION,
  EmptyCorpusError,
  PortAbortedError,
  createConsoleDecisionProvider,
  formatSummary,
  formatUndocumented,
  runPort,
  validateConfig,
} from "../index.js";
import type { DecisionProvider, RunResult, Warning } from "../index.js";
import { parseCliArgs, resolveConfig } from "../config.js";

const HELP_TEXT = `
apidocs-porter v${ENGINE_VERSION}

Ports IntelliSense xml doc comments into an API docs repository, filling only
fields that are empty or still "To be added.".

Usage:
  apidocs-porter --docs <dir> --intellisense <dir> --include-assemblies <names> [options]

Inputs:
  --docs, -d <dir>             Docs repository directory (repeatable or comma-separated)
  --intellisense, -i <dir>     IntelliSense xml directory (repeatable or comma-separated)
  --exclude <glob>             Skip matching files during discovery
  --config, -c <path>          Config file (default: ./apidocs-porter.config.json)

Filters (comma-separated; dotted prefix or glob):
  --include-assemblies         Assemblies to port (required)
  --exclude-assemblies
  --include-namespaces         Default: every namespace in the included assemblies
  --exclude-namespaces
  --include-types              Default: every type in the included namespaces
  --exclude-types

Field toggles (all on by default; prefix with --no- to turn off):
  --type-summaries  --type-remarks  --type-params  --type-typeparams
  --member-summaries  --member-remarks  --member-params  --member-typeparams
  --member-returns  --member-properties  --exceptions-new
  --exceptions-existing        Append to existing exception text (off by default)
  --collision-threshold <n>    Word overlap % that marks exception text a duplicate (default: 70)

Behaviour:
  --markdown-remarks           Write remarks as markdown instead of xml
  --flatten-inheritdoc         Copy inherited text instead of keeping <inheritdoc />
  --skip-interface-impls       Do not fall back to interface member docs
  --interface-remarks          Append interface remarks to the explicit implementation note
  --prompts                    Ask which param was meant when names do not match

Output:
  --save                       Write modified docs files (dry run otherwise)
  --print-undoc                List APIs that are still undocumented
  --details                    List every modified element in the summary
  --quiet, -q                  Suppress warnings
  --verbose, -v                Print progress
  --help, -h                   Show this help text

Examples:
  apidocs-porter -d ../api-docs -i ./artifacts/xml --include-assemblies System.IO --save
  apidocs-porter -d ../api-docs -i ./xml --include-assemblies System.Text.Json --markdown-remarks --print-undoc
`.trim();

function printWarnings(warnings: readonly Warning[]): void {
  for (const w of warnings) {
    const where = w.file ? ` (${w.file})` : "";
    process.stderr.write(`[${w.level}] ${w.module}: ${w.message}${where}\n`);
  }
}

async function main(): Promise<number> {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.help) {
    process.stdout.write(HELP_TEXT + "\n");
    return 0;
  }

  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);

  const errors = validateConfig(config);
  if (errors.length > 0) {
    printWarnings(errors);
    process.stderr.write("Run with --help for usage.\n");
    return 1;
  }

  let decisions: DecisionProvider | undefined;
  if (!config.disablePrompts) decisions = createConsoleDecisionProvider();

  let result: RunResult;
  try {
    result = await runPort(config, { decisions, warnings });
  } catch (err: unknown) {
    if (err instanceof PortAbortedError) {
      // the prompt has already said goodbye
      if (config.verbose) process.stderr.write("[INFO] Aborted; no files were saved\n");
      return 0;
    }
    if (err instanceof EmptyCorpusError) {
      if (!args.quiet) printWarnings(warnings);
      process.stderr.write(`[error] ${err.message}\n`);
      return 1;
    }
    throw err;
  } finally {
    decisions?.close?.();
  }

  if (!args.quiet) printWarnings(result.report.warnings);

  if (result.undocumented) {
    process.stdout.write(formatUndocumented(result.undocumented) + "\n");
  }
  process.stdout.write(formatSummary(result.report, config.printSummaryDetails) + "\n");

  if (config.save) {
    process.stderr.write(`Saved ${result.saved.length} file(s)\n`);
  } else if (result.report.modifiedFiles.length > 0) {
    process.stderr.write("Dry run; pass --save to write the modified files.\n");
  }
  return 0;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`Fatal error: ${msg}\n`);
    process.exit(1);
  },
);
