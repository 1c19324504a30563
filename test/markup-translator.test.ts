import { describe, it, expect } from "vitest";
import {
  cleanInterfaceRemarks,
  explicitInterfaceDisclaimer,
  formatAsMarkdown,
  formatAsXml,
  formatExceptionText,
  formatRemarks,
  PRIMITIVE_TYPES,
  removeUndesiredEndlines,
  toMarkdown,
} from "../src/markup-translator.js";

describe("formatAsXml", () => {
  it("qualifies primitive aliases and normalizes self-closing tags", () => {
    expect(formatAsXml('<see cref="int"/> or <seealso cref="string"/>')).toBe(
      '<see cref="T:System.Int32" /> or <seealso cref="T:System.String" />',
    );
    expect(formatAsXml('<see cref="T:N.T"/>')).toBe('<see cref="T:N.T" />');
  });

  it("writes dynamic as a reserved word", () => {
    expect(formatAsXml('<see cref="dynamic" />')).toBe('<see langword="dynamic" />');
  });

  it("leaves already translated markup unchanged", () => {
    const aliases = Object.keys(PRIMITIVE_TYPES)
      .map((alias) => `<see cref="${alias}"/>`)
      .join("\n");
    const text = `${aliases}\n<see cref="dynamic"/> <see langword="null"/> <paramref name="count"/>.`;

    const once = formatAsXml(text, true);
    expect(once.match(/cref="T:System\.[A-Za-z0-9]+"/g)).toHaveLength(17);
    expect(once.endsWith('<see langword="dynamic" /> <see langword="null" /> <paramref name="count" />.')).toBe(true);
    expect(formatAsXml(once, true)).toBe(once);
  });

  it("joins wrapped lines only when asked", () => {
    expect(formatAsXml("one\ntwo")).toBe("one\ntwo");
    expect(formatAsXml("one\ntwo", true)).toBe("one two");
  });
});

describe("removeUndesiredEndlines", () => {
  it("keeps breaks after sentences, colons and blank lines", () => {
    expect(removeUndesiredEndlines("a\nb.\nc:\nd\n\ne")).toBe("a b.\nc:\nd\n\ne");
  });
});

describe("toMarkdown", () => {
  it("rewrites references and inline code", () => {
    expect(
      toMarkdown(
        'Call <see cref="M:N.T.Run"/> on <see cref="T:N.T">the type</see>; pass <c>0</c> or <see langword="null"/>.',
      ),
    ).toBe("Call <xref:N.T.Run> on [the type](xref:N.T); pass `0` or `null`.");
  });

  it("turns paragraphs into blank lines and decodes entities", () => {
    expect(toMarkdown("<para>One</para><para>a &lt; b &amp;&amp; c</para>")).toBe("One\n\na < b && c");
  });

  it("unwraps an existing markdown block", () => {
    expect(toMarkdown('<format type="text/markdown"><![CDATA[\n## Remarks\n\nBody text.\n]]></format>')).toBe(
      "Body text.",
    );
  });
});

describe("formatAsMarkdown", () => {
  it("indents the block for types", () => {
    expect(formatAsMarkdown("Hi", "Type")).toBe(
      '\n      <format type="text/markdown"><![CDATA[\n\n## Remarks\n\nHi\n\n      ]]></format>\n    ',
    );
  });

  it("indents the block for members", () => {
    expect(formatAsMarkdown("Hi", "Member")).toBe(
      '\n          <format type="text/markdown"><![CDATA[\n\n## Remarks\n\nHi\n\n          ]]></format>\n        ',
    );
  });

  it("is selected by formatRemarks", () => {
    expect(formatRemarks("Hi", "Type", true)).toBe(formatAsMarkdown("Hi", "Type"));
    expect(formatRemarks('<see cref="bool"/>\nline', "Type", false)).toBe('<see cref="T:System.Boolean" /> line');
  });
});

describe("explicit interface helpers", () => {
  it("reduces interface remarks to plain lines", () => {
    expect(
      cleanInterfaceRemarks(
        '<format type="text/markdown"><![CDATA[\n\n## Remarks\n\nFirst line.\n\n  Second line.\n\n]]></format>',
      ),
    ).toBe("First line.\nSecond line.");
  });

  it("names both types in the disclaimer", () => {
    expect(explicitInterfaceDisclaimer("T:N.Widget", "T:N.IWidget")).toBe(
      "This member is an explicit interface member implementation. It can be used only when the " +
        '<see cref="T:N.Widget" /> instance is cast to an <see cref="T:N.IWidget" /> interface.',
    );
  });
});

describe("formatExceptionText", () => {
  it("puts alternatives on their own paragraphs", () => {
    expect(formatExceptionText("A is null.-or-B is empty.")).toBe("A is null.\n\n-or-\n\nB is empty.");
  });
});
