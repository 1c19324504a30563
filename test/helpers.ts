import { createConfig } from "../src/config.js";
import { createDocsContainer, loadDocsXml } from "../src/docs-container.js";
import type { DocsContainer } from "../src/docs-container.js";
import type { DocsMember, DocsType } from "../src/docs-model.js";
import { createIntelliSenseContainer, loadIntelliSenseXml } from "../src/intellisense-xml.js";
import type { IntelliSenseContainer } from "../src/intellisense-xml.js";
import { portMissingDocs } from "../src/porter.js";
import type { Decision, DecisionProvider, DecisionRequest } from "../src/decision-provider.js";
import { serializeDocument } from "../src/xml-helper.js";
import type { PortConfig, PortReport, Warning } from "../src/types.js";

export const TEST_ASSEMBLY = "MyAssembly";

export function testConfig(overrides: Partial<PortConfig> = {}): PortConfig {
  return createConfig({ includedAssemblies: [TEST_ASSEMBLY], ...overrides });
}

export interface LoadedStrings {
  source: IntelliSenseContainer;
  docs: DocsContainer;
  warnings: Warning[];
  /** Docs file paths in load order: Doc0.xml, Doc1.xml, ... */
  paths: string[];
}

export function loadStrings(
  intelliSense: string | string[],
  docFiles: string | string[],
  config: PortConfig,
): LoadedStrings {
  const warnings: Warning[] = [];
  const source = createIntelliSenseContainer();
  const docs = createDocsContainer();

  [intelliSense].flat().forEach((text, i) => {
    loadIntelliSenseXml(source, text, `IntelliSense${i}.xml`, config, warnings);
  });
  const paths = [docFiles].flat().map((text, i) => {
    const path = `Doc${i}.xml`;
    loadDocsXml(docs, text, { path }, config, warnings);
    return path;
  });
  return { source, docs, warnings, paths };
}

export function outputOf(docs: DocsContainer, path: string): string {
  const file = docs.files.get(path);
  if (!file) throw new Error(`No docs file loaded as ${path}`);
  return serializeDocument(file.document);
}

export function typeIn(docs: DocsContainer, docId: string): DocsType {
  const type = docs.types.get(docId);
  if (!type) throw new Error(`No docs type ${docId}`);
  return type;
}

export function memberIn(docs: DocsContainer, docId: string): DocsMember {
  const member = docs.members.get(docId);
  if (!member) throw new Error(`No docs member ${docId}`);
  return member;
}

export interface PortedStrings extends LoadedStrings {
  report: PortReport;
  /** Serialized docs files, in load order. */
  outputs: string[];
}

/** Load the given documents, port, and serialize every docs file back. */
export async function portStrings(
  intelliSense: string | string[],
  docFiles: string | string[],
  overrides: Partial<PortConfig> = {},
  decisions?: DecisionProvider,
): Promise<PortedStrings> {
  const config = testConfig(overrides);
  const loaded = loadStrings(intelliSense, docFiles, config);
  const report = await portMissingDocs(loaded.source, loaded.docs, config, {
    decisions,
    warnings: loaded.warnings,
  });
  const outputs = loaded.paths.map((p) => outputOf(loaded.docs, p));
  return { ...loaded, report, outputs };
}

/** Decision provider that replays a fixed list of answers and records the requests. */
export function scriptedDecisions(answers: Decision[]): DecisionProvider & { requests: DecisionRequest[] } {
  const requests: DecisionRequest[] = [];
  let next = 0;
  return {
    requests,
    async choose(request: DecisionRequest): Promise<Decision> {
      requests.push(request);
      const answer = answers[next++];
      if (!answer) throw new Error(`Unexpected prompt for ${request.kind} ${request.name}`);
      return answer;
    },
  };
}

/** Minimal IntelliSense document around the given `<member>` elements. */
export function intelliSenseXml(members: string, assembly = TEST_ASSEMBLY): string {
  return `<?xml version="1.0"?>
<doc>
  <assembly>
    <name>${assembly}</name>
  </assembly>
  <members>
${members}
  </members>
</doc>`;
}

export interface MemberSpec {
  name: string;
  docId: string;
  memberType?: string;
  returnType?: string;
  /** [name, type] pairs. */
  parameters?: [string, string][];
  implementsMember?: string;
  /** Lines inside `<Docs>`. */
  docs: string[];
}

export interface TypeSpec {
  name: string;
  fullName: string;
  docId: string;
  assembly?: string;
  baseTypeName?: string;
  interfaces?: string[];
  docs: string[];
  members?: MemberSpec[];
}

function escapeAttr(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function docsBlock(lines: string[], indent: string): string {
  if (lines.length === 0) return `${indent}<Docs>\n${indent}</Docs>`;
  return [`${indent}<Docs>`, ...lines.map((l) => `${indent}  ${l}`), `${indent}</Docs>`].join("\n");
}

function memberXml(m: MemberSpec, assembly: string): string {
  const lines = [
    `    <Member MemberName="${escapeAttr(m.name)}">`,
    `      <MemberSignature Language="DocId" Value="${m.docId}" />`,
    `      <MemberType>${m.memberType ?? "Method"}</MemberType>`,
  ];
  if (m.implementsMember) {
    lines.push(
      "      <Implements>",
      `        <InterfaceMember>${m.implementsMember}</InterfaceMember>`,
      "      </Implements>",
    );
  }
  lines.push(
    "      <AssemblyInfo>",
    `        <AssemblyName>${assembly}</AssemblyName>`,
    "      </AssemblyInfo>",
    "      <ReturnValue>",
    `        <ReturnType>${m.returnType ?? "System.Void"}</ReturnType>`,
    "      </ReturnValue>",
  );
  if (m.parameters && m.parameters.length > 0) {
    lines.push("      <Parameters>");
    for (const [name, type] of m.parameters) {
      lines.push(`        <Parameter Name="${name}" Type="${escapeAttr(type)}" />`);
    }
    lines.push("      </Parameters>");
  }
  lines.push(docsBlock(m.docs, "      "), "    </Member>");
  return lines.join("\n");
}

/** A docs repository type file in the layout the docs tooling writes. */
export function docsTypeXml(spec: TypeSpec): string {
  const assembly = spec.assembly ?? TEST_ASSEMBLY;
  const lines = [
    `<Type Name="${escapeAttr(spec.name)}" FullName="${escapeAttr(spec.fullName)}">`,
    `  <TypeSignature Language="DocId" Value="${spec.docId}" />`,
    "  <AssemblyInfo>",
    `    <AssemblyName>${assembly}</AssemblyName>`,
    "  </AssemblyInfo>",
  ];
  if (spec.baseTypeName) {
    lines.push("  <Base>", `    <BaseTypeName>${spec.baseTypeName}</BaseTypeName>`, "  </Base>");
  }
  if (spec.interfaces && spec.interfaces.length > 0) {
    lines.push("  <Interfaces>");
    for (const name of spec.interfaces) {
      lines.push("    <Interface>", `      <InterfaceName>${escapeAttr(name)}</InterfaceName>`, "    </Interface>");
    }
    lines.push("  </Interfaces>");
  }
  lines.push(docsBlock(spec.docs, "  "));
  const members = spec.members ?? [];
  if (members.length > 0) {
    lines.push("  <Members>", ...members.map((m) => memberXml(m, assembly)), "  </Members>");
  } else {
    lines.push("  <Members />");
  }
  lines.push("</Type>");
  return lines.join("\n");
}
