import path from "node:path";
import fs from "fs-extra";
import YAML from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_SLUG_WORDS } from "./slug.js";

export const PROJECT_CONFIG_FILENAME = "specflow.config.yaml";
export const DEFAULT_SPECS_ROOT = "specs";
export const DEFAULT_SPEC_TEMPLATE = path.join("templates", "spec-template.md");

const ProjectConfigSchema = z.object({
  specs: z
    .object({
      root: z.string().trim().min(1).default(DEFAULT_SPECS_ROOT),
      template: z.string().trim().min(1).default(DEFAULT_SPEC_TEMPLATE),
    })
    .default({}),
  branch: z
    .object({
      words: z.number().int().min(1).max(10).default(DEFAULT_SLUG_WORDS),
    })
    .default({}),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export type ResolvedProjectConfig = ProjectConfig & {
  /** Absolute path of the config file, or null when defaults were used. */
  source: string | null;
  specsDir: string;
  templatePath: string;
};

export function defaultProjectConfig(): ProjectConfig {
  return ProjectConfigSchema.parse({});
}

export function parseProjectConfig(raw: string, configPath: string): ProjectConfig {
  let data: unknown;
  try {
    data = YAML.parse(raw);
  } catch (error) {
    throw new ConfigError(configPath, `invalid YAML (${error instanceof Error ? error.message : String(error)})`);
  }
  const result = ProjectConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ConfigError(configPath, `${where}: ${issue?.message ?? "invalid configuration"}`);
  }
  return result.data;
}

export async function loadProjectConfig(repoRoot: string): Promise<ResolvedProjectConfig> {
  const configPath = path.join(repoRoot, PROJECT_CONFIG_FILENAME);
  let config = defaultProjectConfig();
  let source: string | null = null;
  if (await fs.pathExists(configPath)) {
    const raw = await fs.readFile(configPath, "utf8");
    config = parseProjectConfig(raw, configPath);
    source = configPath;
  }
  return {
    ...config,
    source,
    specsDir: path.resolve(repoRoot, config.specs.root),
    templatePath: path.resolve(repoRoot, config.specs.template),
  };
}
