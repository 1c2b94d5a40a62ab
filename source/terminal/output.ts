import chalk, { type ChalkInstance } from "chalk";
import type { LineTone, ReportLine } from "../budget/report.ts";

const toneStyles: Record<LineTone, ChalkInstance | undefined> = {
  plain: undefined,
  heading: chalk.bold.cyan,
  success: chalk.green,
  failure: chalk.red,
  warning: chalk.yellow,
};

export function writeln(input: string): void {
  process.stdout.write(`${input}\n`);
}

export function writeError(input: string): void {
  process.stderr.write(chalk.red(`✖️  ${input}\n`));
}

export function writeWarning(input: string): void {
  process.stdout.write(chalk.yellow(`⚠ ${input}\n`));
}

export function writeLines(lines: readonly ReportLine[]): void {
  for (const { text, tone } of lines) {
    const style = toneStyles[tone];
    writeln(style ? style(text) : text);
  }
}
