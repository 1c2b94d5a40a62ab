import { parseArgs } from "node:util";
import { z } from "zod";
import type { RoleSelection } from "./cli.ts";
import { UsageError } from "./errors.ts";

export const helpText = `
Usage
  $ ctx-budget [profile] [role] [phase_dir | phases_dir] [options]

Arguments
  profile            quality (200k), balanced (100k), budget (32k), tiny (8k)
  role               executor, planner or all (default: all)
  phase_dir          Phase directory (required for executor)
  phases_dir         With role "all": root searched for the first phase
                     (default: .planning/phases)

Options
  --profile, -p      Explicit profile name (overrides --model)
  --model, -m        Model identifier used to detect the profile
  --role, -r         executor | planner | all
  --phase-dir        Phase directory for the executor check
  --phases-dir       Root searched for the first phase by "all"
  --cwd              Project root (default: current directory)
  --json             Print results as JSON

  --help, -h         Show help
  --version, -v      Show version

Examples
  $ ctx-budget balanced all
  $ ctx-budget balanced all .planning/phases
  $ ctx-budget budget planner
  $ ctx-budget budget executor .planning/phases/03-authentication
  $ ctx-budget --model claude-3-haiku-20240307 --role planner
`;

const RoleSchema = z.enum(["executor", "planner", "all"]);

export interface ParsedArgs {
  profile: string | undefined;
  model: string | undefined;
  role: RoleSelection;
  phaseDir: string | undefined;
  phasesDir: string | undefined;
  cwd: string | undefined;
  json: boolean;
  help: boolean;
  version: boolean;
}

/**
 * Flags win over the positional `[profile] [role] [dir]` form. The third
 * positional names a phase directory, except under role "all" where it is
 * the root searched for phases.
 * @throws UsageError
 */
export function parseCliArgs(argv: string[]): ParsedArgs {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (error) {
    throw new UsageError(
      error instanceof Error ? error.message : String(error),
    );
  }

  const flags = parsed.values;
  const [profileArg, roleArg, dirArg] = parsed.positionals;

  const roleInput = flags.role ?? roleArg ?? "all";
  const role = RoleSchema.safeParse(roleInput);
  if (!role.success) {
    throw new UsageError(`Invalid role '${roleInput}'`);
  }

  const searchesPhases = role.data === "all";

  return {
    profile: flags.profile ?? profileArg,
    model: flags.model,
    role: role.data,
    phaseDir: flags["phase-dir"] ?? (searchesPhases ? undefined : dirArg),
    phasesDir: flags["phases-dir"] ?? (searchesPhases ? dirArg : undefined),
    cwd: flags.cwd,
    json: flags.json === true,
    help: flags.help === true,
    version: flags.version === true,
  };
}

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      profile: { type: "string", short: "p" },
      model: { type: "string", short: "m" },
      role: { type: "string", short: "r" },
      "phase-dir": { type: "string" },
      "phases-dir": { type: "string" },
      cwd: { type: "string" },
      json: { type: "boolean", default: false },

      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
    },
    allowPositionals: true,
  });
}
