import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { DEFAULTS, createConfig, parseCliArgs, resolveConfig, validateConfig } from "../src/config.js";
import type { ParsedArgs } from "../src/config.js";
import type { Warning } from "../src/types.js";

function args(overrides: Partial<ParsedArgs> = {}): ParsedArgs {
  return { docs: [], intelliSense: [], lists: {}, toggles: {}, quiet: false, help: false, ...overrides };
}

describe("parseCliArgs", () => {
  it("collects directories, lists, toggles and the threshold", async () => {
    const parsed = await parseCliArgs([
      "-d",
      "docs",
      "-i",
      "xml",
      "--include-assemblies",
      "System.IO,System.Text",
      "--include-assemblies",
      "System.Net",
      "--no-member-remarks",
      "--flatten-inheritdoc",
      "--collision-threshold",
      "50",
      "--save",
    ]);

    expect(parsed).toEqual({
      docs: ["docs"],
      intelliSense: ["xml"],
      config: undefined,
      lists: { includedAssemblies: ["System.IO", "System.Text", "System.Net"] },
      toggles: { portMemberRemarks: false, preserveInheritDocTag: false, save: true },
      collisionThreshold: 50,
      quiet: false,
      help: false,
    });
  });

  it("maps behaviour switches to their settings", async () => {
    const parsed = await parseCliArgs([
      "--markdown-remarks",
      "--skip-interface-impls",
      "--interface-remarks",
      "--prompts",
      "--print-undoc",
      "--details",
      "-v",
      "-q",
    ]);

    expect(parsed.toggles).toEqual({
      markdownRemarks: true,
      skipInterfaceImplementations: true,
      skipInterfaceRemarks: false,
      disablePrompts: false,
      printUndoc: true,
      printSummaryDetails: true,
      verbose: true,
    });
    expect(parsed.quiet).toBe(true);
  });

  it("treats positional arguments as docs directories", async () => {
    const parsed = await parseCliArgs(["--docs", "a", "b", "c"]);
    expect(parsed.docs).toEqual(["a", "b", "c"]);
  });

  it("reads help and config", async () => {
    const parsed = await parseCliArgs(["-h", "-c", "porter.json"]);
    expect(parsed.help).toBe(true);
    expect(parsed.config).toBe("porter.json");
  });
});

describe("createConfig", () => {
  it("starts from the defaults and copies list settings", () => {
    const config = createConfig({ includedAssemblies: ["A"] });
    config.exclude.push("**/skip.xml");

    expect(DEFAULTS.exclude).toEqual([]);
    expect(config.includedAssemblies).toEqual(["A"]);
    expect(config.preserveInheritDocTag).toBe(true);
    expect(config.portExceptionsExisting).toBe(false);
    expect(config.exceptionCollisionThreshold).toBe(70);
  });
});

describe("resolveConfig", () => {
  let root: string | undefined;

  afterEach(() => {
    if (root) rmSync(root, { recursive: true, force: true });
    root = undefined;
  });

  it("resolves directories against the working directory", () => {
    const config = resolveConfig(args({ docs: ["docs"], intelliSense: ["xml"] }));
    expect(config.docsDirs).toEqual([resolve("docs")]);
    expect(config.intelliSenseDirs).toEqual([resolve("xml")]);
  });

  it("layers the config file under the command line", () => {
    root = mkdtempSync(join(tmpdir(), "apidocs-porter-"));
    const path = join(root, "porter.json");
    writeFileSync(
      path,
      JSON.stringify({
        includedAssemblies: ["FromFile"],
        excludedTypes: ["N.Internal*"],
        markdownRemarks: true,
        portTypeRemarks: "yes",
        exceptionCollisionThreshold: 40,
        colour: "blue",
      }),
    );
    const warnings: Warning[] = [];

    const config = resolveConfig(
      args({
        config: path,
        lists: { includedAssemblies: ["FromArgs"] },
        toggles: { markdownRemarks: false },
        collisionThreshold: 55,
      }),
      warnings,
    );

    expect(config.includedAssemblies).toEqual(["FromArgs"]);
    expect(config.excludedTypes).toEqual(["N.Internal*"]);
    expect(config.markdownRemarks).toBe(false);
    expect(config.portTypeRemarks).toBe(true);
    expect(config.exceptionCollisionThreshold).toBe(55);
    expect(warnings.map((w) => w.message)).toEqual([
      `${path}: portTypeRemarks must be a boolean; ignored`,
      `${path}: colour is not a known setting; ignored`,
    ]);
  });

  it("warns about a missing or malformed config file", () => {
    root = mkdtempSync(join(tmpdir(), "apidocs-porter-"));
    const broken = join(root, "broken.json");
    const list = join(root, "list.json");
    writeFileSync(broken, "{ not json");
    writeFileSync(list, "[]");
    const warnings: Warning[] = [];

    resolveConfig(args({ config: join(root, "absent.json") }), warnings);
    resolveConfig(args({ config: list }), warnings);
    resolveConfig(args({ config: broken }), warnings);

    expect(warnings[0].message).toBe(`Config file not found: ${join(root, "absent.json")}`);
    expect(warnings[1].message).toBe(`Config file ${list} must contain a JSON object`);
    expect(warnings[2].message.startsWith(`Failed to parse config file ${broken}:`)).toBe(true);
    expect(warnings).toHaveLength(3);
  });
});

describe("validateConfig", () => {
  it("requires assemblies and both directory sets", () => {
    expect(validateConfig(createConfig()).map((w) => w.message)).toEqual([
      "At least one included assembly is required (--include-assemblies).",
      "At least one docs directory is required (--docs).",
      "At least one IntelliSense xml directory is required (--intellisense).",
    ]);
  });

  it("can skip the directory checks for in-memory runs", () => {
    expect(validateConfig(createConfig({ includedAssemblies: ["A"] }), false)).toEqual([]);
  });

  it("rejects a threshold outside 0..100", () => {
    const config = createConfig({ includedAssemblies: ["A"], exceptionCollisionThreshold: 101 });
    expect(validateConfig(config, false)).toEqual([
      {
        level: "error",
        module: "config",
        message: "Exception collision threshold must be between 0 and 100 (got 101).",
      },
    ]);
  });
});
