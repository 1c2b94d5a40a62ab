#!/usr/bin/env node
import path from "node:path";
import { helpText, parseCliArgs } from "./args.ts";
import {
  formatBudgetReport,
  formatProfileHeader,
  formatSummary,
} from "./budget/report.ts";
import { Cli } from "./cli.ts";
import { ConfigManager } from "./config.ts";
import { BudgetError, UsageError } from "./errors.ts";
import { logger } from "./logger.ts";
import {
  writeError,
  writeLines,
  writeln,
  writeWarning,
} from "./terminal/output.ts";
import { getPackageVersion } from "./version.ts";

const EXIT_WITHIN_BUDGET = 0;
const EXIT_OVER_BUDGET = 1;
const EXIT_USAGE = 2;

function handleError(error: unknown): number {
  if (error instanceof BudgetError) {
    logger.error({ error }, error.message);
    writeError(`${error.name}: ${error.message}`);
    if (error instanceof UsageError) {
      writeln(helpText);
    }
    return EXIT_USAGE;
  }
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error({ error: err }, err.message);
  writeError(`Unexpected error: ${err.message}`);
  return EXIT_USAGE;
}

async function main(): Promise<number> {
  const flags = parseCliArgs(process.argv.slice(2));

  if (flags.version) {
    writeln(getPackageVersion());
    return EXIT_WITHIN_BUDGET;
  }

  if (flags.help) {
    writeln(helpText);
    return EXIT_WITHIN_BUDGET;
  }

  const cwd = path.resolve(flags.cwd ?? process.cwd());
  const projectConfig = await new ConfigManager({
    projectRoot: cwd,
  }).readProjectConfig();

  const cli = new Cli({
    cwd,
    config: projectConfig,
    role: flags.role,
    profileOverride: flags.profile,
    model: flags.model,
    phaseDir: flags.phaseDir,
    phasesDir: flags.phasesDir,
  });

  const { selection, results, warnings } = await cli.run();
  const allWithinBudget = results.every((result) => result.withinBudget);

  if (flags.json) {
    writeln(
      JSON.stringify(
        {
          profile: selection.profile,
          source: selection.source,
          results: results.map(({ diagnostics, ...result }) => ({
            ...result,
            diagnostics: diagnostics.map((d) => d.message),
          })),
          warnings,
          withinBudget: allWithinBudget,
        },
        null,
        2,
      ),
    );
  } else {
    writeLines(formatProfileHeader(selection.profile));
    writeln("");
    for (const warning of warnings) {
      writeWarning(warning);
    }
    for (const result of results) {
      writeLines(formatBudgetReport(result));
      writeln("");
    }
    writeLines(formatSummary(selection.profile));
  }

  return allWithinBudget ? EXIT_WITHIN_BUDGET : EXIT_OVER_BUDGET;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.exitCode = handleError(error);
  },
);
