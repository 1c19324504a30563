// src/errors.ts: Error types that end a run or reject a document

/** A document that could not be parsed as XML, or lacks the expected root. */
export class XmlParseError extends Error {
  readonly file?: string;

  constructor(message: string, file?: string) {
    super(file ? `${file}: ${message}` : message);
    this.name = "XmlParseError";
    this.file = file;
  }
}

/** The operator chose to exit from an interactive prompt. */
export class PortAbortedError extends Error {
  constructor() {
    super("Porting aborted by the operator.");
    this.name = "PortAbortedError";
  }
}

/** One side of the run has nothing to work with; nothing was modified. */
export class EmptyCorpusError extends Error {
  readonly side: "intellisense" | "docs";

  constructor(side: "intellisense" | "docs") {
    super(
      side === "intellisense"
        ? "No IntelliSense xml comments found."
        : "No Docs Type APIs found.",
    );
    this.name = "EmptyCorpusError";
    this.side = side;
  }
}
