import { Chalk } from "chalk";

export type Paint = (text: string) => string;

export interface Colors {
  readonly enabled: boolean;
  bold: Paint;
  dim: Paint;
  cyan: Paint;
  red: Paint;
  yellow: Paint;
}

/** Disabled colors return their input unchanged. */
export function createColors(enabled: boolean): Colors {
  const chalk = new Chalk({ level: enabled ? 1 : 0 });
  return {
    enabled,
    bold: (text) => chalk.bold(text),
    dim: (text) => chalk.dim(text),
    cyan: (text) => chalk.cyan(text),
    red: (text) => chalk.red(text),
    yellow: (text) => chalk.yellow(text),
  };
}

export const plainColors: Colors = createColors(false);
