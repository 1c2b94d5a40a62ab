import assert from "node:assert/strict";
import path from "node:path";
import { after, before, describe, it } from "node:test";
import { buildRegistry, Cli, type CliOptions } from "../source/cli.ts";
import type { ProjectConfig } from "../source/config.ts";
import {
  InvalidProfileDefinitionError,
  UnknownProfileError,
  UsageError,
} from "../source/errors.ts";
import {
  createTestFixtures,
  type TestFixtures,
} from "./utils/test-fixtures.ts";

function projectConfig(overrides: Partial<ProjectConfig> = {}): ProjectConfig {
  return {
    defaultProfile: "balanced",
    planningDir: ".planning",
    charsPerToken: 4,
    sparsify: { frontmatterLines: 30, maxSections: 3 },
    profiles: {},
    detection: { rules: [] },
    ...overrides,
  };
}

describe("buildRegistry", () => {
  it("registers configured profiles over the built-ins", () => {
    const registry = buildRegistry(
      projectConfig({
        profiles: {
          budget: {
            capacityTokens: 64_000,
            targetPercent: 10,
            strategy: "sparse_balanced",
          },
          local: {
            capacityTokens: 4000,
            targetPercent: 50,
            strategy: "minimal",
          },
        },
      }),
    );
    assert.equal(registry.resolve("budget").capacityTokens, 64_000);
    assert.equal(registry.resolve("local").strategy, "minimal");
    assert.equal(registry.resolve("quality").capacityTokens, 200_000);
  });

  it("rejects invalid configured profiles", () => {
    assert.throws(
      () =>
        buildRegistry(
          projectConfig({
            profiles: {
              broken: {
                capacityTokens: -1,
                targetPercent: 10,
                strategy: "full",
              },
            },
          }),
        ),
      InvalidProfileDefinitionError,
    );
  });
});

describe("Cli.run", () => {
  let fixtures: TestFixtures;
  let emptyProject: string;

  before(async () => {
    fixtures = await createTestFixtures("cli");
    await fixtures.createFile(".planning/STATE.md", "s".repeat(40));
    await fixtures.createFile(".planning/ROADMAP.md", "## Phase 1: Setup\n");
    await fixtures.createFile(
      ".planning/phases/01-setup/01-01-PLAN.md",
      "p".repeat(80),
    );
    await fixtures.createFile(
      ".planning/phases/01-setup/01-CONTEXT.md",
      "c".repeat(400),
    );
    await fixtures.createDir(".planning/phases/02-auth");
    emptyProject = await fixtures.createDir("empty");
  });

  after(async () => {
    await fixtures.cleanup();
  });

  const options = (overrides: Partial<CliOptions>): CliOptions => ({
    cwd: fixtures.root,
    config: projectConfig(),
    role: "all",
    ...overrides,
  });

  it("checks the planner and the first phase in all mode", async () => {
    const run = await new Cli(options({ profileOverride: "quality" })).run();

    assert.equal(run.selection.profile.name, "quality");
    assert.deepEqual(
      run.results.map((result) => result.role),
      ["planner", "executor"],
    );
    const [planner, executor] = run.results;
    // STATE.md (40 chars), ROADMAP.md (18) and the phase's CONTEXT.md (400)
    assert.deepEqual(planner?.perComponentTokens, {
      state: 10,
      roadmap: 5,
      requirements: 0,
      context: 100,
      research: 0,
    });
    assert.equal(planner?.totalTokens, 115);
    // PLAN.md (80 chars) + STATE.md (40 chars) in full
    assert.equal(executor?.perComponentTokens.plan, 20);
    assert.equal(executor?.totalTokens, 30);
    assert.ok(run.results.every((result) => result.withinBudget));
    assert.deepEqual(run.warnings, []);
  });

  it("searches an explicit phases root in all mode", async () => {
    const run = await new Cli(
      options({ profileOverride: "quality", phasesDir: ".planning/phases" }),
    ).run();
    assert.deepEqual(run.warnings, []);
    assert.equal(run.results[1]?.perComponentTokens.plan, 20);
  });

  it("detects the profile from the model identifier", async () => {
    const run = await new Cli(
      options({ role: "planner", model: "claude-3-haiku-20240307" }),
    ).run();
    assert.equal(run.selection.profile.name, "budget");
    assert.equal(run.selection.source, "detected");
  });

  it("falls back to the configured model and default profile", async () => {
    const fromConfig = await new Cli(
      options({
        role: "planner",
        config: projectConfig({ model: "llama-3.1-8b" }),
      }),
    ).run();
    assert.equal(fromConfig.selection.profile.name, "tiny");

    const fallback = await new Cli(
      options({
        role: "planner",
        config: projectConfig({ defaultProfile: "quality" }),
      }),
    ).run();
    assert.equal(fallback.selection.profile.name, "quality");
    assert.equal(fallback.selection.source, "default");
  });

  it("requires a phase directory for the executor role", async () => {
    await assert.rejects(
      () => new Cli(options({ role: "executor" })).run(),
      UsageError,
    );
  });

  it("checks an explicit phase directory", async () => {
    const run = await new Cli(
      options({
        role: "executor",
        profileOverride: "quality",
        phaseDir: ".planning/phases/02-auth",
      }),
    ).run();
    assert.equal(run.results.length, 1);
    assert.equal(run.results[0]?.perComponentTokens.plan, 0);
    assert.deepEqual(run.warnings, [
      `No *-PLAN.md found in ${path.join(fixtures.root, ".planning/phases/02-auth")}`,
    ]);
  });

  it("propagates an unknown explicit profile", async () => {
    await assert.rejects(
      () => new Cli(options({ profileOverride: "colossal" })).run(),
      UnknownProfileError,
    );
  });

  it("warns outside a planning project and still reports zero usage", async () => {
    const run = await new Cli(options({ cwd: emptyProject })).run();
    assert.deepEqual(run.warnings, [
      `Not in a planning project (no ${path.join(".planning", "STATE.md")}). Run this from your project root.`,
      `Phase directory not found: ${path.join(emptyProject, ".planning", "phases")}`,
    ]);
    assert.equal(run.results.length, 1);
    assert.equal(run.results[0]?.role, "planner");
    assert.equal(run.results[0]?.totalTokens, 0);
    assert.equal(run.results[0]?.withinBudget, true);
  });

  it("flags an over-budget delegation", async () => {
    const run = await new Cli(
      options({
        role: "planner",
        profileOverride: "cramped",
        config: projectConfig({
          profiles: {
            cramped: {
              capacityTokens: 100,
              targetPercent: 10,
              strategy: "full",
            },
          },
        }),
      }),
    ).run();
    const [planner] = run.results;
    assert.equal(planner?.budgetTokens, 10);
    assert.equal(planner?.totalTokens, 15);
    assert.equal(planner?.withinBudget, false);
    assert.equal(planner?.headroomOrOverageTokens, -5);
  });
});
