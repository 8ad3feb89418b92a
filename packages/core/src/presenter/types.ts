/** Where commands and the runtime write user-facing text. */
export interface OutputSink {
  readonly isTTY: boolean;
  writeLine(line: string): void;
  writeError(line: string): void;
}
