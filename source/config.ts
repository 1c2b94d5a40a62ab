import { mkdirSync } from "node:fs";
import fs from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.ts";
import { formatZodIssues, jsonParser } from "./parsing.ts";
import { strategies } from "./profiles/registry.ts";

export const CONFIG_DIR_NAME = ".ctx-budget";
export const CONFIG_FILE_NAME = "ctx-budget.json";

const defaultConfig = {
  defaultProfile: "balanced",
  planningDir: ".planning",
  charsPerToken: 4,
  sparsify: {
    frontmatterLines: 30,
    maxSections: 3,
  },
} as const;

const ProfileOverrideSchema = z.object({
  capacityTokens: z.number(),
  targetPercent: z.number(),
  strategy: z.enum(strategies),
});

const DetectionRuleSchema = z.object({
  pattern: z.string().min(1),
  profile: z.string().min(1),
});

const ProjectConfigSchema = z.object({
  defaultProfile: z
    .string()
    .min(1)
    .optional()
    .default(defaultConfig.defaultProfile),
  model: z.string().optional(),
  planningDir: z.string().optional().default(defaultConfig.planningDir),
  charsPerToken: z
    .number()
    .positive()
    .optional()
    .default(defaultConfig.charsPerToken),
  sparsify: z
    .object({
      frontmatterLines: z
        .number()
        .int()
        .nonnegative()
        .default(defaultConfig.sparsify.frontmatterLines),
      maxSections: z
        .number()
        .int()
        .nonnegative()
        .default(defaultConfig.sparsify.maxSections),
    })
    .optional()
    .default(defaultConfig.sparsify),
  profiles: z.record(ProfileOverrideSchema).optional().default({}),
  detection: z
    .object({
      rules: z.array(DetectionRuleSchema).default([]),
    })
    .optional()
    .default({ rules: [] }),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
type PartialConfig = z.input<typeof ProjectConfigSchema>;

export class DirectoryProvider {
  private baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  getPath(subdir?: string): string {
    return subdir ? path.join(this.baseDir, subdir) : this.baseDir;
  }

  // For call-sites that need the directory before any await (the logger)
  ensurePathSync(subdir?: string): string {
    const dirPath = this.getPath(subdir);
    mkdirSync(dirPath, { recursive: true });
    return dirPath;
  }
}

export class ConfigManager {
  readonly project: DirectoryProvider;
  readonly app: DirectoryProvider;

  constructor({
    projectRoot = process.cwd(),
    appRoot = homedir(),
  }: { projectRoot?: string; appRoot?: string } = {}) {
    this.project = new DirectoryProvider(
      path.join(projectRoot, CONFIG_DIR_NAME),
    );
    this.app = new DirectoryProvider(path.join(appRoot, CONFIG_DIR_NAME));
  }

  private async _readConfig(configPath: string): Promise<PartialConfig> {
    let data: string;
    try {
      data = await fs.readFile(configPath, "utf8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return {};
      }
      throw error;
    }

    const parsed = jsonParser(ProjectConfigSchema.partial()).safeParse(data);
    if (!parsed.success) {
      throw new ConfigError(configPath, formatZodIssues(parsed.error));
    }
    return parsed.data;
  }

  /**
   * Merges the app-level config under the project-level one. Missing files
   * contribute nothing; invalid files throw ConfigError.
   */
  async readProjectConfig(): Promise<ProjectConfig> {
    const appConfigPath = path.join(this.app.getPath(), CONFIG_FILE_NAME);
    const projectConfigPath = path.join(
      this.project.getPath(),
      CONFIG_FILE_NAME,
    );

    const appConfig = await this._readConfig(appConfigPath);
    const projectConfig = await this._readConfig(projectConfigPath);

    const mergedConfig = {
      ...appConfig,
      ...projectConfig,
      profiles: {
        ...appConfig.profiles,
        ...projectConfig.profiles,
      },
    };

    const parsed = ProjectConfigSchema.safeParse(mergedConfig);
    if (!parsed.success) {
      throw new ConfigError(projectConfigPath, formatZodIssues(parsed.error));
    }
    return parsed.data;
  }
}

export const config = new ConfigManager();
