// src/config.ts: Config Resolver
// defaults ← config file ← CLI flags. mri for arg parsing.

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import type { PortConfig, Warning } from "./types.js";

export const CONFIG_FILE_NAME = "apidocs-porter.config.json";

export type BooleanSetting = {
  [K in keyof PortConfig]: PortConfig[K] extends boolean ? K : never;
}[keyof PortConfig];

export type ListSetting = {
  [K in keyof PortConfig]: PortConfig[K] extends string[] ? K : never;
}[keyof PortConfig];

export interface ParsedArgs {
  docs: string[];
  intelliSense: string[];
  config?: string;
  lists: Partial<Record<ListSetting, string[]>>;
  toggles: Partial<Record<BooleanSetting, boolean>>;
  collisionThreshold?: number;
  quiet: boolean;
  help: boolean;
}

export const DEFAULTS: PortConfig = {
  docsDirs: [],
  intelliSenseDirs: [],
  exclude: [],

  includedAssemblies: [],
  excludedAssemblies: [],
  includedNamespaces: [],
  excludedNamespaces: [],
  includedTypes: [],
  excludedTypes: [],

  portTypeSummaries: true,
  portTypeRemarks: true,
  portTypeParams: true,
  portTypeTypeParams: true,
  portMemberSummaries: true,
  portMemberRemarks: true,
  portMemberParams: true,
  portMemberTypeParams: true,
  portMemberReturns: true,
  portMemberProperties: true,
  portExceptionsNew: true,
  portExceptionsExisting: false,
  exceptionCollisionThreshold: 70,

  markdownRemarks: false,
  preserveInheritDocTag: true,
  skipInterfaceImplementations: false,
  skipInterfaceRemarks: true,
  disablePrompts: true,

  save: false,
  printUndoc: false,
  printSummaryDetails: false,
  verbose: false,
};

const BOOLEAN_SETTINGS: readonly BooleanSetting[] = [
  "portTypeSummaries",
  "portTypeRemarks",
  "portTypeParams",
  "portTypeTypeParams",
  "portMemberSummaries",
  "portMemberRemarks",
  "portMemberParams",
  "portMemberTypeParams",
  "portMemberReturns",
  "portMemberProperties",
  "portExceptionsNew",
  "portExceptionsExisting",
  "markdownRemarks",
  "preserveInheritDocTag",
  "skipInterfaceImplementations",
  "skipInterfaceRemarks",
  "disablePrompts",
  "save",
  "printUndoc",
  "printSummaryDetails",
  "verbose",
];

const LIST_SETTINGS: readonly ListSetting[] = [
  "docsDirs",
  "intelliSenseDirs",
  "exclude",
  "includedAssemblies",
  "excludedAssemblies",
  "includedNamespaces",
  "excludedNamespaces",
  "includedTypes",
  "excludedTypes",
];

const DIR_SETTINGS: ReadonlySet<ListSetting> = new Set(["docsDirs", "intelliSenseDirs"]);

/**
 * Config with no directories, every list empty and the documented defaults.
 * Pass overrides for the settings a caller cares about.
 */
export function createConfig(overrides: Partial<PortConfig> = {}): PortConfig {
  const config: PortConfig = { ...DEFAULTS, ...overrides };
  for (const key of LIST_SETTINGS) config[key] = [...config[key]];
  return config;
}

/**
 * Resolve config from CLI args, config file, and defaults.
 */
export function resolveConfig(args: ParsedArgs, warnings: Warning[] = []): PortConfig {
  const fileConfig = loadConfigFile(args.config, warnings) ?? {};

  // Merge: defaults ← fileConfig ← CLI args
  const config = createConfig(fileConfig);

  for (const key of LIST_SETTINGS) {
    const fromArgs = args.lists[key];
    if (fromArgs && fromArgs.length > 0) config[key] = [...fromArgs];
  }
  if (args.docs.length > 0) config.docsDirs = args.docs;
  if (args.intelliSense.length > 0) config.intelliSenseDirs = args.intelliSense;
  for (const key of DIR_SETTINGS) config[key] = config[key].map((p) => resolve(p));

  for (const key of BOOLEAN_SETTINGS) {
    const fromArgs = args.toggles[key];
    if (fromArgs !== undefined) config[key] = fromArgs;
  }
  if (args.collisionThreshold !== undefined) {
    config.exceptionCollisionThreshold = args.collisionThreshold;
  }

  return config;
}

/**
 * Problems that make a run pointless. Returned as error warnings; an empty
 * array means the config is usable.
 */
export function validateConfig(config: PortConfig, requireDirs = true): Warning[] {
  const errors: Warning[] = [];
  const fail = (message: string) => errors.push({ level: "error", module: "config", message });

  if (config.includedAssemblies.length === 0) {
    fail("At least one included assembly is required (--include-assemblies).");
  }
  if (requireDirs && config.docsDirs.length === 0) {
    fail("At least one docs directory is required (--docs).");
  }
  if (requireDirs && config.intelliSenseDirs.length === 0) {
    fail("At least one IntelliSense xml directory is required (--intellisense).");
  }
  const t = config.exceptionCollisionThreshold;
  if (!Number.isFinite(t) || t < 0 || t > 100) {
    fail(`Exception collision threshold must be between 0 and 100 (got ${t}).`);
  }
  return errors;
}

function loadConfigFile(
  configPath: string | undefined,
  warnings: Warning[],
): Partial<PortConfig> | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(process.cwd(), CONFIG_FILE_NAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }
  return null;
}

function parseConfigFile(filePath: string, warnings: Warning[]): Partial<PortConfig> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Config file ${filePath} must contain a JSON object`,
    });
    return null;
  }
  return readConfigObject(new Map(Object.entries(parsed)), filePath, warnings);
}

/** Keep only known settings of the right shape; report the rest. */
function readConfigObject(
  entries: Map<string, unknown>,
  filePath: string,
  warnings: Warning[],
): Partial<PortConfig> {
  const result: Partial<PortConfig> = {};
  const ignore = (key: string, why: string) =>
    warnings.push({ level: "warn", module: "config", message: `${filePath}: ${key} ${why}; ignored` });

  for (const [key, value] of entries) {
    const boolKey = BOOLEAN_SETTINGS.find((k) => k === key);
    if (boolKey) {
      if (typeof value === "boolean") result[boolKey] = value;
      else ignore(key, "must be a boolean");
      continue;
    }
    const listKey = LIST_SETTINGS.find((k) => k === key);
    if (listKey) {
      if (Array.isArray(value) && value.every((v): v is string => typeof v === "string")) {
        result[listKey] = value;
      } else {
        ignore(key, "must be an array of strings");
      }
      continue;
    }
    if (key === "exceptionCollisionThreshold") {
      if (typeof value === "number") result.exceptionCollisionThreshold = value;
      else ignore(key, "must be a number");
      continue;
    }
    ignore(key, "is not a known setting");
  }
  return result;
}

// ─── CLI ────────────────────────────────────────────────────────────────────

const LIST_FLAGS: Record<string, ListSetting> = {
  "include-assemblies": "includedAssemblies",
  "exclude-assemblies": "excludedAssemblies",
  "include-namespaces": "includedNamespaces",
  "exclude-namespaces": "excludedNamespaces",
  "include-types": "includedTypes",
  "exclude-types": "excludedTypes",
  exclude: "exclude",
};

/** Field toggles; each also accepts a `--no-` form. */
const FIELD_FLAGS: Record<string, BooleanSetting> = {
  "type-summaries": "portTypeSummaries",
  "type-remarks": "portTypeRemarks",
  "type-params": "portTypeParams",
  "type-typeparams": "portTypeTypeParams",
  "member-summaries": "portMemberSummaries",
  "member-remarks": "portMemberRemarks",
  "member-params": "portMemberParams",
  "member-typeparams": "portMemberTypeParams",
  "member-returns": "portMemberReturns",
  "member-properties": "portMemberProperties",
  "exceptions-new": "portExceptionsNew",
  "exceptions-existing": "portExceptionsExisting",
};

/** Switches that only ever set their setting to a fixed value. */
const SWITCH_FLAGS: Record<string, [BooleanSetting, boolean]> = {
  save: ["save", true],
  "markdown-remarks": ["markdownRemarks", true],
  "flatten-inheritdoc": ["preserveInheritDocTag", false],
  "skip-interface-impls": ["skipInterfaceImplementations", true],
  "interface-remarks": ["skipInterfaceRemarks", false],
  prompts: ["disablePrompts", false],
  "print-undoc": ["printUndoc", true],
  details: ["printSummaryDetails", true],
  verbose: ["verbose", true],
};

/** Repeatable, comma-separated string flag values, flattened. */
function listValue(raw: unknown): string[] {
  const values = Array.isArray(raw) ? raw : raw === undefined ? [] : [raw];
  return values
    .filter((v) => typeof v === "string" || typeof v === "number")
    .flatMap((v) => String(v).split(","))
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

function flagValue(args: Record<string, unknown>, name: string): boolean | undefined {
  const value = args[name];
  return typeof value === "boolean" ? value : undefined;
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args: Record<string, unknown> = mri(argv, {
    alias: { d: "docs", i: "intellisense", c: "config", q: "quiet", v: "verbose", h: "help" },
    boolean: ["quiet", "help", ...Object.keys(FIELD_FLAGS), ...Object.keys(SWITCH_FLAGS)],
    string: ["docs", "intellisense", "config", "collision-threshold", ...Object.keys(LIST_FLAGS)],
  });

  const lists: ParsedArgs["lists"] = {};
  for (const [flag, key] of Object.entries(LIST_FLAGS)) {
    const values = listValue(args[flag]);
    if (values.length > 0) lists[key] = values;
  }

  // mri turns `--no-x` into `x: false`
  const toggles: ParsedArgs["toggles"] = {};
  for (const [flag, key] of Object.entries(FIELD_FLAGS)) {
    const value = flagValue(args, flag);
    if (value !== undefined) toggles[key] = value;
  }
  for (const [flag, [key, value]] of Object.entries(SWITCH_FLAGS)) {
    if (flagValue(args, flag) === true) toggles[key] = value;
  }

  const rawThreshold = args["collision-threshold"];
  const collisionThreshold =
    typeof rawThreshold === "string" && rawThreshold !== "" ? Number(rawThreshold) : undefined;

  const config = args.config;
  return {
    docs: [...listValue(args.docs), ...listValue(args._)],
    intelliSense: listValue(args.intellisense),
    config: typeof config === "string" && config !== "" ? config : undefined,
    lists,
    toggles,
    collisionThreshold,
    quiet: flagValue(args, "quiet") ?? false,
    help: flagValue(args, "help") ?? false,
  };
}
