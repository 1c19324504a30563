// src/decision-provider.ts: Operator decisions for unmatched param names
// The engine asks a DecisionProvider; the console provider speaks a two-level
// numeric protocol over a line stream.

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

export type DecisionKind = "param" | "typeparam";

export interface DecisionRequest {
  kind: DecisionKind;
  /** Name declared in the docs file that has no source counterpart. */
  name: string;
  docId: string;
  file: string;
  /** Names available in the source fragment. */
  candidates: string[];
}

export type Decision =
  | { action: "select"; name: string }
  | { action: "skip" }
  | { action: "abort" };

export interface DecisionProvider {
  choose(request: DecisionRequest): Promise<Decision>;
  close?(): void;
}

export interface ConsoleStreams {
  input: Readable;
  output: Writable;
}

/**
 * Interactive provider.
 *   First question:  0 exit, 1 pick a candidate, 2 skip.
 *   Second question: 0 exit, 1 skip, 2.. the candidates in order.
 * Non-numeric or out-of-range answers are asked again; end of input aborts.
 */
export function createConsoleDecisionProvider(
  streams: ConsoleStreams = { input: process.stdin, output: process.stderr },
): DecisionProvider {
  const { output } = streams;
  let lines: AsyncIterator<string> | undefined;
  let closeInput: (() => void) | undefined;

  const write = (text: string) => {
    output.write(text);
  };

  const ask = async (question: string, max: number): Promise<number | undefined> => {
    let iterator = lines;
    if (!iterator) {
      const rl = createInterface({ input: streams.input, terminal: false });
      iterator = lines = rl[Symbol.asyncIterator]();
      closeInput = () => rl.close();
    }
    for (;;) {
      write(question);
      const next = await iterator.next();
      if (next.done) return undefined;
      const answer = next.value.trim();
      if (!/^\d+$/.test(answer)) {
        write("Not a number. Try again.\n");
        continue;
      }
      const option = parseInt(answer, 10);
      if (option > max) {
        write("Invalid selection. Try again.\n");
        continue;
      }
      return option;
    }
  };

  return {
    async choose(request: DecisionRequest): Promise<Decision> {
      write(`Problem in ${request.kind} '${request.name}' in member '${request.docId}' in file '${request.file}'\n`);
      write(`The ${request.kind} probably exists in code, but the exact name was not found in Docs. What would you like to do?\n`);
      write("    0 - Exit program.\n");
      write(`    1 - Select the correct IntelliSense xml ${request.kind} from the existing ones.\n`);
      write(`    2 - Ignore this ${request.kind} and continue.\n`);

      const option = await ask("Your answer [0,1,2]: ", 2);
      if (option === undefined || option === 0) {
        write("Goodbye!\n");
        return { action: "abort" };
      }
      if (option === 2) {
        write(`Skipping this ${request.kind}.\n`);
        return { action: "skip" };
      }

      write(`IntelliSense xml ${request.kind}s found in member '${request.docId}':\n`);
      write("    0 - Exit program.\n");
      write(`    1 - Ignore this ${request.kind} and continue.\n`);
      request.candidates.forEach((candidate, i) => {
        write(`    ${i + 2} - ${candidate}\n`);
      });

      const last = request.candidates.length + 1;
      const selection = await ask(
        `Your answer to match ${request.kind} '${request.name}'? [0..${last}]: `,
        last,
      );
      if (selection === undefined || selection === 0) {
        write("Goodbye!\n");
        return { action: "abort" };
      }
      if (selection === 1) {
        write(`Skipping this ${request.kind}.\n`);
        return { action: "skip" };
      }
      const name = request.candidates[selection - 2];
      write(`Selected: ${name}\n`);
      return { action: "select", name };
    },

    close(): void {
      closeInput?.();
    },
  };
}
