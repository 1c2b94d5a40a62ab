import path from "node:path";
import { globby } from "globby";
import type { SectionRule } from "../sparsify/sections.ts";
import type { SectionSpec } from "../sparsify/sparsifier.ts";

export const roles = ["executor", "planner"] as const;

export type Role = (typeof roles)[number];

export type ComponentKey =
  | "plan"
  | "state"
  | "config"
  | "roadmap"
  | "requirements"
  | "context"
  | "research";

export interface Component {
  role: Role;
  key: ComponentKey;
  label: string;
  /** Undefined when no backing document could be located. */
  sourcePath: string | undefined;
  spec: SectionSpec;
}

export interface ComponentLocations {
  /** Holds STATE.md, ROADMAP.md, REQUIREMENTS.md and config.json. */
  planningDir: string;
  /** Holds the phase's *-PLAN.md, *-CONTEXT.md and *-RESEARCH.md files. */
  phaseDir?: string | undefined;
}

const currentPosition: SectionRule = {
  kind: "heading",
  marker: "### Current Position",
  maxLines: 10,
};
const decisionsMade: SectionRule = {
  kind: "heading",
  marker: "### Decisions Made",
  maxLines: 20,
};
const pendingTodos: SectionRule = {
  kind: "heading",
  marker: "### Pending Todos",
  maxLines: 10,
};

const frontmatterOnly = (shape: SectionSpec["shape"]): SectionSpec => ({
  shape,
  includeFrontmatter: true,
  sections: [],
});

export const componentSpecs = {
  executor: {
    plan: frontmatterOnly("plan"),
    state: {
      shape: "document",
      includeFrontmatter: true,
      sections: [currentPosition, decisionsMade],
    },
    config: {
      shape: "document",
      includeFrontmatter: false,
      sections: [
        {
          kind: "lines",
          patterns: ['"model_profile"', '"mode"'],
          scanLines: 20,
        },
      ],
    },
  },
  planner: {
    state: {
      shape: "document",
      includeFrontmatter: true,
      sections: [currentPosition, decisionsMade, pendingTodos],
    },
    roadmap: {
      shape: "document",
      includeFrontmatter: false,
      sections: [{ kind: "match", pattern: "Phase ", after: 10, maxLines: 20 }],
    },
    requirements: frontmatterOnly("document"),
    context: {
      shape: "document",
      includeFrontmatter: true,
      sections: [{ kind: "heading", marker: "## Decisions", maxLines: 20 }],
    },
    research: {
      shape: "document",
      includeFrontmatter: true,
      sections: [{ kind: "heading", marker: "## Summary", maxLines: 20 }],
    },
  },
} as const satisfies Record<Role, Partial<Record<ComponentKey, SectionSpec>>>;

export const componentLabels: Record<ComponentKey, string> = {
  plan: "Plan",
  state: "State",
  config: "Config",
  roadmap: "Roadmap (current phase)",
  requirements: "Requirements",
  context: "Phase context",
  research: "Phase research",
};

/** Keys every estimate for the role must carry, in report order. */
export function expectedKeys(role: Role): ComponentKey[] {
  return Object.keys(componentSpecs[role]).filter(isComponentKey);
}

function isComponentKey(key: string): key is ComponentKey {
  return Object.hasOwn(componentLabels, key);
}

/**
 * First file in the phase directory matching `*-<SUFFIX>.md`, sorted by
 * name so that numbered plans resolve deterministically.
 */
export async function findPhaseFile(
  phaseDir: string | undefined,
  suffix: string,
): Promise<string | undefined> {
  if (!phaseDir) {
    return undefined;
  }
  const matches = await globby(`*-${suffix}.md`, {
    cwd: phaseDir,
    absolute: true,
    onlyFiles: true,
  });
  return matches.sort()[0];
}

/** Phase directories named like `03-authentication`, sorted. */
export async function findPhaseDirs(phasesRoot: string): Promise<string[]> {
  const matches = await globby("??-*", {
    cwd: phasesRoot,
    absolute: true,
    onlyDirectories: true,
    deep: 1,
  });
  return matches.sort();
}

async function sourcePathFor(
  key: ComponentKey,
  { planningDir, phaseDir }: ComponentLocations,
): Promise<string | undefined> {
  switch (key) {
    case "plan":
      return findPhaseFile(phaseDir, "PLAN");
    case "context":
      return findPhaseFile(phaseDir, "CONTEXT");
    case "research":
      return findPhaseFile(phaseDir, "RESEARCH");
    case "state":
      return path.join(planningDir, "STATE.md");
    case "roadmap":
      return path.join(planningDir, "ROADMAP.md");
    case "requirements":
      return path.join(planningDir, "REQUIREMENTS.md");
    case "config":
      return path.join(planningDir, "config.json");
    default: {
      const unreachable: never = key;
      throw new Error(`Unhandled component key: ${String(unreachable)}`);
    }
  }
}

export async function componentsFor(
  role: Role,
  locations: ComponentLocations,
): Promise<Component[]> {
  const specs: Partial<Record<ComponentKey, SectionSpec>> =
    componentSpecs[role];
  return Promise.all(
    expectedKeys(role).map(async (key) => {
      const spec = specs[key];
      if (!spec) {
        throw new Error(`No section spec for ${role} component '${key}'`);
      }
      return {
        role,
        key,
        label: componentLabels[key],
        sourcePath: await sourcePathFor(key, locations),
        spec,
      };
    }),
  );
}
