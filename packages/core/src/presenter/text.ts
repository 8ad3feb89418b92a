import type { OutputSink } from "./types";
import type { Colors } from "./colors";
import { plainColors } from "./colors";

export interface TextPresenterOptions {
  /** Drop regular output; errors are still written. */
  quiet?: boolean;
  colors?: Colors;
}

export function createTextPresenter({ quiet = false, colors = plainColors }: TextPresenterOptions = {}): OutputSink {
  const isTTY = process.stdout.isTTY === true;
  return {
    isTTY,
    writeLine: (line) => {
      if (!quiet) {
        console.log(line);
      }
    },
    writeError: (line) => console.error(colors.red(line)),
  };
}

export interface MemoryPresenter extends OutputSink {
  readonly lines: string[];
  readonly errors: string[];
  /** Regular output joined with newlines. */
  text(): string;
}

/** Records everything in memory, e.g. for embedding or generated docs. */
export function createMemoryPresenter(): MemoryPresenter {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    isTTY: false,
    lines,
    errors,
    writeLine: (line) => {
      lines.push(line);
    },
    writeError: (line) => {
      errors.push(line);
    },
    text: () => lines.join("\n"),
  };
}
