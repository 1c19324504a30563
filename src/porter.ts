// src/porter.ts: Resolution engine
// Fills empty docs fields from the best available source text. Per field the
// candidates are tried in order: the direct IntelliSense member, the text its
// inherit-doc marker resolves to, then the implemented interface member.
// Populated fields are never overwritten. Types are ported before members.

import type { DecisionKind, DecisionProvider } from "./decision-provider.js";
import { lookupApi } from "./docs-container.js";
import type { DocsContainer } from "./docs-container.js";
import {
  addException,
  appendExceptionText,
  commentsOf,
  entryValue,
  getExceptions,
  getField,
  getParams,
  getTypeParams,
  isDelegateType,
  isEnumField,
  isMethod,
  isProperty,
  setEntryValue,
  setField,
  setInheritDoc,
  wordCountCollidesAboveThreshold,
} from "./docs-model.js";
import type { DocsApi, DocsMember, DocsType } from "./docs-model.js";
import { memberNameOf, prefixOf, stripParameters, stripPrefix, typeNameToDocId } from "./doc-id.js";
import { EmptyCorpusError, PortAbortedError } from "./errors.js";
import type { IntelliSenseContainer, IntelliSenseMember } from "./intellisense-xml.js";
import {
  cleanInterfaceRemarks,
  explicitInterfaceDisclaimer,
  formatAsXml,
  formatExceptionText,
  formatRemarks,
} from "./markup-translator.js";
import { TO_BE_ADDED, createReport, isDocsEmpty } from "./types.js";
import type {
  CommentSource,
  ModifiedElementName,
  NamedText,
  PortConfig,
  PortReport,
  Warning,
} from "./types.js";

export interface PortOptions {
  /** Consulted for unmatched param names when prompts are enabled. */
  decisions?: DecisionProvider;
  warnings?: Warning[];
}

interface PortContext {
  config: PortConfig;
  source: IntelliSenseContainer;
  docs: DocsContainer;
  decisions?: DecisionProvider;
  report: PortReport;
  /** APIs fully handled in this run. */
  done: Set<string>;
  /** APIs on the current recursion path. */
  active: Set<string>;
  seenFiles: Set<string>;
  seenApis: Set<string>;
}

interface ResolvedText {
  value: string;
  isExplicitInterface: boolean;
}

/**
 * Port missing documentation from the IntelliSense corpus into the docs corpus.
 * Throws EmptyCorpusError before touching anything when either side is empty,
 * and PortAbortedError when the operator chooses to exit from a prompt.
 */
export async function portMissingDocs(
  source: IntelliSenseContainer,
  docs: DocsContainer,
  config: PortConfig,
  options: PortOptions = {},
): Promise<PortReport> {
  if (source.members.size === 0) throw new EmptyCorpusError("intellisense");
  if (docs.types.size === 0) throw new EmptyCorpusError("docs");

  const report = createReport();
  if (options.warnings) report.warnings = options.warnings;

  const ctx: PortContext = {
    config,
    source,
    docs,
    decisions: options.decisions,
    report,
    done: new Set(),
    active: new Set(),
    seenFiles: new Set(),
    seenApis: new Set(),
  };

  for (const type of docs.types.values()) await portType(ctx, type);
  for (const member of docs.members.values()) await portMember(ctx, member);
  return report;
}

// ─── Bookkeeping ────────────────────────────────────────────────────────────

function enter(ctx: PortContext, api: DocsApi): boolean {
  if (ctx.done.has(api.docId)) return false;
  if (ctx.active.has(api.docId)) {
    ctx.report.warnings.push({
      level: "info",
      module: "porter",
      message: `Inheritance cycle through ${api.docId}; using its current docs`,
      file: api.file,
    });
    return false;
  }
  ctx.active.add(api.docId);
  return true;
}

function leave(ctx: PortContext, api: DocsApi): void {
  ctx.active.delete(api.docId);
  ctx.done.add(api.docId);
}

function record(
  ctx: PortContext,
  api: DocsApi,
  element: ModifiedElementName,
  name: string | undefined,
  isExplicitInterface: boolean,
): void {
  const { report } = ctx;
  report.modifications.push({ docId: api.docId, element, name, file: api.file, isExplicitInterface });
  report.totalModifiedElements++;

  if (!ctx.seenApis.has(api.docId)) {
    ctx.seenApis.add(api.docId);
    (api.kind === "Type" ? report.modifiedTypes : report.modifiedApis).push(api.docId);
  }
  if (!ctx.seenFiles.has(api.file)) {
    ctx.seenFiles.add(api.file);
    report.modifiedFiles.push(api.file);
  }
}

function problem(ctx: PortContext, message: string): void {
  ctx.report.problems.push(message);
}

function firstText(sources: readonly CommentSource[], pick: (s: CommentSource) => string): string | undefined {
  for (const s of sources) {
    const text = pick(s);
    if (!isDocsEmpty(text)) return text;
  }
  return undefined;
}

/** Properties keep their text under `value` or, in some exports, under `returns`. */
function propertyValue(s: CommentSource): string {
  return isDocsEmpty(s.value) ? s.returns : s.value;
}

// ─── Types ──────────────────────────────────────────────────────────────────

async function portType(ctx: PortContext, type: DocsType): Promise<void> {
  if (!enter(ctx, type)) return;
  try {
    const direct = ctx.source.members.get(type.docId);
    if (!direct) return;

    const inherited = await resolveInheritance(ctx, type, direct);
    const sources: CommentSource[] = inherited ? [direct, inherited] : [direct];

    portSummary(ctx, type, sources);
    portRemarks(ctx, type, sources);
    await portNamedEntries(ctx, type, "param", direct, inherited);
    await portNamedEntries(ctx, type, "typeparam", direct, inherited);
    if (isDelegateType(type)) portReturns(ctx, type, sources);
  } finally {
    leave(ctx, type);
  }
}

// ─── Members ────────────────────────────────────────────────────────────────

async function portMember(ctx: PortContext, member: DocsMember): Promise<void> {
  if (!enter(ctx, member)) return;
  try {
    const direct = ctx.source.members.get(member.docId);
    // A preserved inheritdoc marker stands in for any text the interface could supply.
    const preserved = direct !== undefined && direct.inheritDoc && ctx.config.preserveInheritDocTag;
    const interfaced = preserved ? undefined : interfacedMemberOf(ctx, member);
    if (interfaced) await portMember(ctx, interfaced);
    if (!direct && !interfaced) return;

    const inherited = direct ? await resolveInheritance(ctx, member, direct) : undefined;
    const sources = [direct, inherited].filter((s): s is CommentSource => s !== undefined);
    const fallback = interfaced ? commentsOf(interfaced) : undefined;

    portSummary(ctx, member, sources, fallback);
    portRemarks(ctx, member, sources, fallback, interfaced);
    await portNamedEntries(ctx, member, "param", direct, inherited, fallback);
    await portNamedEntries(ctx, member, "typeparam", direct, inherited, fallback);
    if (direct) portExceptions(ctx, member, direct);

    if (isProperty(member)) portValue(ctx, member, sources, fallback);
    else if (isMethod(member)) portReturns(ctx, member, sources, fallback);
  } finally {
    leave(ctx, member);
  }
}

function interfacedMemberOf(ctx: PortContext, member: DocsMember): DocsMember | undefined {
  if (ctx.config.skipInterfaceImplementations) return undefined;
  const id = member.implementsInterfaceMember;
  if (id === "" || id === member.docId) return undefined;
  return ctx.docs.members.get(id);
}

/**
 * An explicit implementation is named after the interface member it implements
 * (`System.IDisposable.Dispose`), which its DocId encodes with `#` separators.
 */
function isExplicitImplementation(member: DocsMember, interfaced: DocsMember): boolean {
  if (member.memberName === stripParameters(stripPrefix(interfaced.docId))) return true;
  const segment = memberNameOf(member.docId);
  return segment.includes("#") && !segment.startsWith("#");
}

// ─── Inherit-doc ────────────────────────────────────────────────────────────

async function resolveInheritance(
  ctx: PortContext,
  api: DocsApi,
  direct: IntelliSenseMember,
): Promise<CommentSource | undefined> {
  if (!direct.inheritDoc) return undefined;

  if (ctx.config.preserveInheritDocTag) {
    if (setInheritDoc(api, direct.inheritDocCref)) {
      record(ctx, api, "inheritdoc", direct.inheritDocCref, false);
    }
    return undefined;
  }

  const cref = direct.inheritDocCref;
  if (cref) {
    const fromSource = ctx.source.members.get(cref);
    if (fromSource) return fromSource;
    const fromDocs = lookupApi(ctx.docs, cref);
    if (fromDocs) {
      await portApi(ctx, fromDocs);
      return commentsOf(fromDocs);
    }
  }

  return api.kind === "Type" ? inheritFromType(ctx, api) : inheritFromMember(ctx, api);
}

function ancestorTypeIds(type: DocsType): string[] {
  return [type.baseTypeName, ...type.interfaceNames]
    .filter((name) => name !== "")
    .map(typeNameToDocId)
    .filter((id) => id !== type.docId);
}

async function inheritFromType(ctx: PortContext, type: DocsType): Promise<CommentSource | undefined> {
  for (const id of ancestorTypeIds(type)) {
    const ancestor = ctx.docs.types.get(id);
    if (!ancestor) continue;
    await portType(ctx, ancestor);
    return commentsOf(ancestor);
  }
  return undefined;
}

async function inheritFromMember(ctx: PortContext, member: DocsMember): Promise<CommentSource | undefined> {
  const owner = stripPrefix(member.parentType.docId);
  const unprefixed = stripPrefix(member.docId);
  if (!unprefixed.startsWith(`${owner}.`)) return undefined;
  const suffix = unprefixed.slice(owner.length);

  for (const id of ancestorTypeIds(member.parentType)) {
    const ancestor = ctx.docs.members.get(`${prefixOf(member.docId)}${stripPrefix(id)}${suffix}`);
    if (!ancestor) continue;
    await portMember(ctx, ancestor);
    return commentsOf(ancestor);
  }
  return undefined;
}

async function portApi(ctx: PortContext, api: DocsApi): Promise<void> {
  if (api.kind === "Type") await portType(ctx, api);
  else await portMember(ctx, api);
}

// ─── Fields ─────────────────────────────────────────────────────────────────

function portSummary(
  ctx: PortContext,
  api: DocsApi,
  sources: readonly CommentSource[],
  fallback?: CommentSource,
): void {
  const enabled = api.kind === "Type" ? ctx.config.portTypeSummaries : ctx.config.portMemberSummaries;
  if (!enabled || !isDocsEmpty(getField(api, "summary"))) return;

  const resolved = resolveText(sources, fallback, (s) => s.summary);
  if (!resolved) return;
  setField(api, "summary", formatAsXml(resolved.value, true));
  record(ctx, api, "summary", undefined, resolved.isExplicitInterface);
}

function portRemarks(
  ctx: PortContext,
  api: DocsApi,
  sources: readonly CommentSource[],
  fallback?: CommentSource,
  interfaced?: DocsMember,
): void {
  const enabled = api.kind === "Type" ? ctx.config.portTypeRemarks : ctx.config.portMemberRemarks;
  if (!enabled || isEnumField(api) || !isDocsEmpty(getField(api, "remarks"))) return;

  let resolved: ResolvedText | undefined;
  const direct = firstText(sources, (s) => s.remarks);
  if (direct) {
    resolved = { value: direct, isExplicitInterface: false };
  } else if (
    api.kind === "Member" &&
    fallback &&
    interfaced &&
    !isDocsEmpty(fallback.remarks) &&
    isExplicitImplementation(api, interfaced)
  ) {
    resolved = {
      value: explicitInterfaceRemarks(ctx, api, interfaced, fallback.remarks),
      isExplicitInterface: true,
    };
  }
  if (!resolved) return;

  setField(api, "remarks", formatRemarks(resolved.value, api.kind, ctx.config.markdownRemarks));
  record(ctx, api, "remarks", undefined, resolved.isExplicitInterface);
}

function explicitInterfaceRemarks(
  ctx: PortContext,
  member: DocsMember,
  interfaced: DocsMember,
  interfaceRemarks: string,
): string {
  const disclaimer = explicitInterfaceDisclaimer(member.parentType.docId, interfaced.parentType.docId);
  if (ctx.config.skipInterfaceRemarks) return disclaimer;
  const cleaned = cleanInterfaceRemarks(interfaceRemarks);
  return cleaned === "" ? disclaimer : `${disclaimer}\n\n${cleaned}`;
}

function portReturns(
  ctx: PortContext,
  api: DocsApi,
  sources: readonly CommentSource[],
  fallback?: CommentSource,
): void {
  if (!ctx.config.portMemberReturns || api.returnType === "System.Void") return;
  if (!isDocsEmpty(getField(api, "returns"))) return;

  const resolved = resolveText(sources, fallback, (s) => s.returns);
  if (!resolved) return;
  setField(api, "returns", formatAsXml(resolved.value, true));
  record(ctx, api, "returns", undefined, resolved.isExplicitInterface);
}

function portValue(
  ctx: PortContext,
  api: DocsMember,
  sources: readonly CommentSource[],
  fallback?: CommentSource,
): void {
  if (!ctx.config.portMemberProperties || !isDocsEmpty(getField(api, "value"))) return;

  const resolved = resolveText(sources, fallback, propertyValue);
  if (!resolved) return;
  setField(api, "value", formatAsXml(resolved.value, true));
  record(ctx, api, "value", undefined, resolved.isExplicitInterface);
}

function resolveText(
  sources: readonly CommentSource[],
  fallback: CommentSource | undefined,
  pick: (s: CommentSource) => string,
): ResolvedText | undefined {
  const text = firstText(sources, pick);
  if (text) return { value: text, isExplicitInterface: false };
  if (fallback && !isDocsEmpty(pick(fallback))) {
    return { value: pick(fallback), isExplicitInterface: true };
  }
  return undefined;
}

// ─── Params and type params ─────────────────────────────────────────────────

function namedListOf(kind: DecisionKind, s: CommentSource): readonly NamedText[] {
  return kind === "param" ? s.params : s.typeParams;
}

async function portNamedEntries(
  ctx: PortContext,
  api: DocsApi,
  kind: DecisionKind,
  direct: CommentSource | undefined,
  inherited: CommentSource | undefined,
  fallback?: CommentSource,
): Promise<void> {
  const { config } = ctx;
  const enabled =
    kind === "param"
      ? api.kind === "Type" ? config.portTypeParams : config.portMemberParams
      : api.kind === "Type" ? config.portTypeTypeParams : config.portMemberTypeParams;
  if (!enabled) return;

  const targets = kind === "param" ? getParams(api) : getTypeParams(api);

  for (const target of targets) {
    if (!isDocsEmpty(entryValue(target))) continue;
    const resolved = await resolveNamed(ctx, api, kind, target.name, targets.length, direct, inherited, fallback);
    if (!resolved) continue;
    setEntryValue(api, target, formatAsXml(resolved.value, true));
    record(ctx, api, kind, target.name, resolved.isExplicitInterface);
  }
}

function findDocumented(list: readonly NamedText[], name: string): NamedText | undefined {
  return list.find((e) => e.name === name && !isDocsEmpty(e.value));
}

async function resolveNamed(
  ctx: PortContext,
  api: DocsApi,
  kind: DecisionKind,
  name: string,
  targetCount: number,
  direct: CommentSource | undefined,
  inherited: CommentSource | undefined,
  fallback: CommentSource | undefined,
): Promise<ResolvedText | undefined> {
  const secondary = (lookup: string): ResolvedText | undefined => {
    const fromAncestor = inherited ? findDocumented(namedListOf(kind, inherited), lookup) : undefined;
    if (fromAncestor) return { value: fromAncestor.value, isExplicitInterface: false };
    const fromInterface = fallback ? findDocumented(namedListOf(kind, fallback), lookup) : undefined;
    return fromInterface ? { value: fromInterface.value, isExplicitInterface: true } : undefined;
  };

  if (!direct) return secondary(name);

  const list = namedListOf(kind, direct);
  const match = list.find((e) => e.name === name);
  if (match) {
    return isDocsEmpty(match.value) ? secondary(name) : { value: match.value, isExplicitInterface: false };
  }

  const alternative = secondary(name);
  if (alternative) return alternative;

  if (list.length === 0) {
    problem(ctx, `There were no IntelliSense xml comments for ${kind} ${name} in Member DocId ${api.docId}`);
    return undefined;
  }
  if (list.length !== targetCount) {
    problem(ctx, `The total number of ${kind}s does not match between IntelliSense and Docs members ${api.docId}`);
    return undefined;
  }

  const selected = await promptForName(ctx, api, kind, name, list);
  if (selected === undefined) {
    problem(ctx, `The ${kind} ${name} was not found in IntelliSense xml for ${api.docId}`);
    return undefined;
  }
  const chosen = list.find((e) => e.name === selected);
  if (chosen && !isDocsEmpty(chosen.value)) return { value: chosen.value, isExplicitInterface: false };
  return secondary(selected) ?? secondary(name);
}

async function promptForName(
  ctx: PortContext,
  api: DocsApi,
  kind: DecisionKind,
  name: string,
  candidates: readonly NamedText[],
): Promise<string | undefined> {
  if (ctx.config.disablePrompts || !ctx.decisions) return undefined;

  const decision = await ctx.decisions.choose({
    kind,
    name,
    docId: api.docId,
    file: api.file,
    candidates: candidates.map((c) => c.name),
  });
  if (decision.action === "abort") throw new PortAbortedError();
  return decision.action === "select" ? decision.name : undefined;
}

// ─── Exceptions ─────────────────────────────────────────────────────────────

function portExceptions(ctx: PortContext, member: DocsMember, direct: IntelliSenseMember): void {
  const { portExceptionsNew, portExceptionsExisting, exceptionCollisionThreshold } = ctx.config;
  if (!portExceptionsNew && !portExceptionsExisting) return;

  for (const ex of direct.exceptions) {
    if (ex.cref === "") continue;
    const text = formatExceptionText(ex.value);
    const existing = getExceptions(member).find((e) => e.name === ex.cref);

    if (!existing) {
      if (!portExceptionsNew) continue;
      addException(member, ex.cref, isDocsEmpty(text) ? TO_BE_ADDED : text);
    } else {
      if (!portExceptionsExisting || isDocsEmpty(text)) continue;
      if (wordCountCollidesAboveThreshold(entryValue(existing), text, exceptionCollisionThreshold)) continue;
      appendExceptionText(member, existing, text);
    }

    ctx.report.addedExceptions.push(`Exception=[${ex.cref}] in Member=[${member.docId}]`);
    record(ctx, member, "exception", ex.cref, false);
  }
}
