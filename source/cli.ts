import { access } from "node:fs/promises";
import path from "node:path";
import { calculateBudget } from "./budget/calculator.ts";
import {
  componentsFor,
  findPhaseDirs,
  type Role,
} from "./budget/components.ts";
import { type ValidatedBudget, validateBudget } from "./budget/validator.ts";
import type { ProjectConfig } from "./config.ts";
import { UsageError } from "./errors.ts";
import { logger } from "./logger.ts";
import {
  createDefaultRegistry,
  type Profile,
  ProfileRegistry,
} from "./profiles/registry.ts";
import { type ProfileSelection, selectProfile } from "./profiles/select.ts";

export type RoleSelection = Role | "all";

export interface CliOptions {
  cwd: string;
  config: ProjectConfig;
  role: RoleSelection;
  profileOverride?: string | undefined;
  model?: string | undefined;
  phaseDir?: string | undefined;
  phasesDir?: string | undefined;
}

export interface CliRun {
  selection: ProfileSelection;
  results: ValidatedBudget[];
  warnings: string[];
}

/**
 * Built-in profiles with the configured overrides registered on top.
 * @throws InvalidProfileDefinitionError
 */
export function buildRegistry(config: ProjectConfig): ProfileRegistry {
  const registry = createDefaultRegistry();
  for (const [name, override] of Object.entries(config.profiles)) {
    registry.register({ name, ...override });
  }
  return registry;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

export class Cli {
  private options: CliOptions;
  private registry: ProfileRegistry;

  constructor(options: CliOptions, registry?: ProfileRegistry) {
    this.options = options;
    this.registry = registry ?? buildRegistry(options.config);
  }

  async run(): Promise<CliRun> {
    const { cwd, config, role, profileOverride } = this.options;
    const warnings: string[] = [];

    const selection = selectProfile(
      { profileOverride, model: this.options.model ?? config.model },
      this.registry,
      {
        rules: config.detection.rules,
        defaultProfile: config.defaultProfile,
      },
    );

    const planningDir = path.resolve(cwd, config.planningDir);
    if (!(await exists(path.join(planningDir, "STATE.md")))) {
      warnings.push(
        `Not in a planning project (no ${path.join(config.planningDir, "STATE.md")}). Run this from your project root.`,
      );
    }

    const phaseDir = this.options.phaseDir
      ? path.resolve(cwd, this.options.phaseDir)
      : undefined;

    const results: ValidatedBudget[] = [];

    if (role === "executor") {
      if (!phaseDir) {
        throw new UsageError("executor requires a phase directory");
      }
      results.push(
        await this.check(
          "executor",
          selection.profile,
          planningDir,
          phaseDir,
          warnings,
        ),
      );
    } else if (role === "planner") {
      results.push(
        await this.check(
          "planner",
          selection.profile,
          planningDir,
          phaseDir,
          warnings,
        ),
      );
    } else {
      // The planner also reads this phase's context and research
      const currentPhase =
        phaseDir ?? (await this.firstPhaseDir(planningDir, warnings));
      results.push(
        await this.check(
          "planner",
          selection.profile,
          planningDir,
          currentPhase,
          warnings,
        ),
      );
      if (currentPhase) {
        results.push(
          await this.check(
            "executor",
            selection.profile,
            planningDir,
            currentPhase,
            warnings,
          ),
        );
      }
    }

    return { selection, results, warnings };
  }

  private async firstPhaseDir(
    planningDir: string,
    warnings: string[],
  ): Promise<string | undefined> {
    const phasesRoot = this.options.phasesDir
      ? path.resolve(this.options.cwd, this.options.phasesDir)
      : path.join(planningDir, "phases");

    if (!(await exists(phasesRoot))) {
      warnings.push(`Phase directory not found: ${phasesRoot}`);
      return undefined;
    }

    const [first] = await findPhaseDirs(phasesRoot);
    if (!first) {
      warnings.push(`No phase directories found in ${phasesRoot}`);
    }
    return first;
  }

  private async check(
    role: Role,
    profile: Profile,
    planningDir: string,
    phaseDir: string | undefined,
    warnings: string[],
  ): Promise<ValidatedBudget> {
    const { config } = this.options;
    const components = await componentsFor(role, { planningDir, phaseDir });
    const plan = components.find(({ key }) => key === "plan");
    if (plan && !plan.sourcePath) {
      warnings.push(`No *-PLAN.md found in ${phaseDir}`);
    }
    const estimate = await calculateBudget(role, profile, components, {
      charsPerToken: config.charsPerToken,
      sparsify: config.sparsify,
    });
    const result = validateBudget(estimate);
    logger.info(
      {
        role,
        profile: profile.name,
        total: result.totalTokens,
        budget: result.budgetTokens,
        withinBudget: result.withinBudget,
      },
      "Budget check complete",
    );
    return result;
  }
}
