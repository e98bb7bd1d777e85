import { bold, cyan, dim, red, yellow } from "colorette";

export interface Logger {
  info(message: string): void;
  /** A filesystem action, or in a dry run the action that would be taken. */
  action(message: string, dryRun: boolean): void;
  warn(message: string): void;
  error(message: string, details?: string[]): void;
  summary(title: string, lines: string[]): void;
}

const DRY_RUN_PREFIX = "[dry-run]";

const indent = (line: string) => `  ${line}`;

/** Draws attention to a non-zero failure count in the summary. */
const highlight = (line: string) => (/^Failures: [1-9]/.test(line) ? red(line) : line);

export function createConsoleLogger(): Logger {
  return {
    info(message) {
      console.log(message);
    },
    action(message, dryRun) {
      console.log(dryRun ? `${yellow(DRY_RUN_PREFIX)} ${message}` : `${cyan("→")} ${message}`);
    },
    warn(message) {
      console.warn(yellow(message));
    },
    error(message, details = []) {
      console.error(red(message));
      details.forEach((detail) => console.error(dim(indent(detail))));
    },
    summary(title, lines) {
      console.log(`\n${bold(title)}`);
      lines.forEach((line) => console.log(indent(highlight(line))));
    },
  };
}
