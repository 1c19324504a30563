import { describe, it, expect } from "vitest";
import { collectUndocumented } from "../src/undocumented.js";
import { docsTypeXml, loadStrings, testConfig } from "./helpers.js";

describe("collectUndocumented", () => {
  it("lists empty fields and placeholder returns and values", () => {
    const xml = docsTypeXml({
      name: "T",
      fullName: "N.T",
      docId: "T:N.T",
      docs: ["<summary>To be added.</summary>"],
      members: [
        {
          name: "Count<TItem>",
          docId: "M:N.T.Count``1(System.Int32)",
          returnType: "System.Int32",
          parameters: [["limit", "System.Int32"]],
          docs: [
            '<typeparam name="TItem">To be added.</typeparam>',
            '<param name="limit"></param>',
            "<summary>Counts.</summary>",
            "<returns>To be added.</returns>",
            '<exception cref="T:System.ArgumentException">To be added.</exception>',
          ],
        },
        {
          name: "Name",
          docId: "P:N.T.Name",
          memberType: "Property",
          returnType: "System.String",
          docs: ["<summary>The name.</summary>", "<value>To be added.</value>"],
        },
        { name: "Stop", docId: "M:N.T.Stop", docs: ["<summary>Stops.</summary>"] },
        {
          name: "Size",
          docId: "P:N.T.Size",
          memberType: "Property",
          returnType: "System.Int32",
          docs: ["<summary>The size.</summary>"],
        },
      ],
    });
    const { docs } = loadStrings([], xml, testConfig());

    const report = collectUndocumented(docs);

    expect(report.entries).toEqual([
      { docId: "T:N.T", category: "typeSummary" },
      { docId: "M:N.T.Count``1(System.Int32)", category: "memberReturns" },
      { docId: "M:N.T.Count``1(System.Int32)", category: "memberParam", name: "limit" },
      { docId: "M:N.T.Count``1(System.Int32)", category: "memberTypeParam", name: "TItem" },
      { docId: "M:N.T.Count``1(System.Int32)", category: "exception", name: "T:System.ArgumentException" },
      { docId: "P:N.T.Name", category: "propertyValue" },
    ]);
    expect(report.counts).toEqual({
      typeSummary: 1,
      memberSummary: 0,
      memberReturns: 1,
      propertyValue: 1,
      memberParam: 1,
      memberTypeParam: 1,
      exception: 1,
    });
  });
});
