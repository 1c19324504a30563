import { Readable, Writable } from "node:stream";
import { describe, it, expect } from "vitest";
import { createConsoleDecisionProvider } from "../src/decision-provider.js";
import type { DecisionRequest } from "../src/decision-provider.js";
import { PortAbortedError } from "../src/errors.js";
import { entryValue, getParams } from "../src/docs-model.js";
import { docsTypeXml, intelliSenseXml, memberIn, portStrings, scriptedDecisions } from "./helpers.js";

function collector(): { output: Writable; text: () => string } {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { output, text: () => chunks.join("") };
}

const request: DecisionRequest = {
  kind: "param",
  name: "myParam",
  docId: "M:N.T.Run(System.Int32,System.Int32)",
  file: "Doc0.xml",
  candidates: ["count", "size"],
};

const MENU =
  "Problem in param 'myParam' in member 'M:N.T.Run(System.Int32,System.Int32)' in file 'Doc0.xml'\n" +
  "The param probably exists in code, but the exact name was not found in Docs. What would you like to do?\n" +
  "    0 - Exit program.\n" +
  "    1 - Select the correct IntelliSense xml param from the existing ones.\n" +
  "    2 - Ignore this param and continue.\n" +
  "Your answer [0,1,2]: ";

describe("console decision provider", () => {
  it("selects a candidate through the two questions", async () => {
    const { output, text } = collector();
    const provider = createConsoleDecisionProvider({ input: Readable.from(["1\n3\n"]), output });

    const decision = await provider.choose(request);
    provider.close?.();

    expect(decision).toEqual({ action: "select", name: "size" });
    expect(text()).toBe(
      MENU +
        "IntelliSense xml params found in member 'M:N.T.Run(System.Int32,System.Int32)':\n" +
        "    0 - Exit program.\n" +
        "    1 - Ignore this param and continue.\n" +
        "    2 - count\n" +
        "    3 - size\n" +
        "Your answer to match param 'myParam'? [0..3]: " +
        "Selected: size\n",
    );
  });

  it("asks again after a non-numeric or out-of-range answer", async () => {
    const { output, text } = collector();
    const provider = createConsoleDecisionProvider({ input: Readable.from(["x\n5\n2\n"]), output });

    const decision = await provider.choose(request);
    provider.close?.();

    expect(decision).toEqual({ action: "skip" });
    expect(text()).toBe(
      MENU +
        "Not a number. Try again.\n" +
        "Your answer [0,1,2]: " +
        "Invalid selection. Try again.\n" +
        "Your answer [0,1,2]: " +
        "Skipping this param.\n",
    );
  });

  it("aborts on 0 and on end of input", async () => {
    const exit = collector();
    const exiting = createConsoleDecisionProvider({ input: Readable.from(["0\n"]), output: exit.output });
    expect(await exiting.choose(request)).toEqual({ action: "abort" });
    exiting.close?.();
    expect(exit.text()).toBe(MENU + "Goodbye!\n");

    const eof = collector();
    const ended = createConsoleDecisionProvider({ input: Readable.from([]), output: eof.output });
    expect(await ended.choose(request)).toEqual({ action: "abort" });
    ended.close?.();
    expect(eof.text()).toBe(MENU + "Goodbye!\n");
  });

  it("keeps reading the same input across requests", async () => {
    const { output } = collector();
    const provider = createConsoleDecisionProvider({ input: Readable.from(["1\n2\n2\n"]), output });

    expect(await provider.choose(request)).toEqual({ action: "select", name: "count" });
    expect(await provider.choose(request)).toEqual({ action: "skip" });
    provider.close?.();
  });
});

describe("porter prompts for unmatched params", () => {
  const source = intelliSenseXml(`
    <member name="M:N.T.Run(System.Int32,System.Int32)">
      <param name="n">The number of runs.</param>
      <param name="s">The batch size.</param>
    </member>`);
  const docs = docsTypeXml({
    name: "T",
    fullName: "N.T",
    docId: "T:N.T",
    docs: [],
    members: [
      {
        name: "Run",
        docId: "M:N.T.Run(System.Int32,System.Int32)",
        parameters: [
          ["count", "System.Int32"],
          ["size", "System.Int32"],
        ],
        docs: ['<param name="count">To be added.</param>', '<param name="size">To be added.</param>'],
      },
    ],
  });
  const run = "M:N.T.Run(System.Int32,System.Int32)";

  it("uses the selected source param and records skipped ones", async () => {
    const decisions = scriptedDecisions([{ action: "select", name: "n" }, { action: "skip" }]);

    const { docs: container, report } = await portStrings(source, docs, { disablePrompts: false }, decisions);

    expect(getParams(memberIn(container, run)).map(entryValue)).toEqual(["The number of runs.", "To be added."]);
    expect(decisions.requests.map((r) => [r.name, r.candidates])).toEqual([
      ["count", ["n", "s"]],
      ["size", ["n", "s"]],
    ]);
    expect(report.problems).toEqual([`The param size was not found in IntelliSense xml for ${run}`]);
  });

  it("does not ask when prompts are disabled", async () => {
    const decisions = scriptedDecisions([]);

    const { report } = await portStrings(source, docs, {}, decisions);

    expect(decisions.requests).toEqual([]);
    expect(report.problems).toEqual([
      `The param count was not found in IntelliSense xml for ${run}`,
      `The param size was not found in IntelliSense xml for ${run}`,
    ]);
  });

  it("stops the run when the operator exits", async () => {
    const decisions = scriptedDecisions([{ action: "abort" }]);

    await expect(portStrings(source, docs, { disablePrompts: false }, decisions)).rejects.toBeInstanceOf(
      PortAbortedError,
    );
  });

  it("reports a param count mismatch without asking", async () => {
    const single = intelliSenseXml(`
    <member name="M:N.T.Run(System.Int32,System.Int32)">
      <param name="n">The number of runs.</param>
    </member>`);
    const decisions = scriptedDecisions([]);

    const { report } = await portStrings(single, docs, { disablePrompts: false }, decisions);

    expect(decisions.requests).toEqual([]);
    expect(report.problems).toEqual([
      `The total number of params does not match between IntelliSense and Docs members ${run}`,
      `The total number of params does not match between IntelliSense and Docs members ${run}`,
    ]);
  });
});
