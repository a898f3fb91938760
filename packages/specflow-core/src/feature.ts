import path from "node:path";
import fs from "fs-extra";
import { loadProjectConfig } from "./config.js";
import { UsageError } from "./errors.js";
import { formatFeatureNumber, nextFeatureNumber, parseFeaturePrefix } from "./numbering.js";
import { buildBranchName, slugifyDescription } from "./slug.js";
import type { VersionControl } from "./vcs.js";
import { createGitVersionControl } from "./vcs.js";
import { listFeatureDirectories, resolveFallbackRoot } from "./workspace.js";

export const SPEC_FILENAME = "spec.md";

export type FeatureLogEvent = { level: "warn"; message: string };

export type FeatureLogListener = (event: FeatureLogEvent) => void;

export type CreateFeatureOptions = {
  description: string;
  /** Explicit feature number; already validated to 1-999 by the caller. */
  featureNumber?: number;
  cwd?: string;
  vcs?: VersionControl;
  /** Root to use when `vcs` finds no repository; discovered from `cwd` when omitted. */
  fallbackRoot?: string;
  log?: FeatureLogListener;
};

export type FeatureResult = {
  branchName: string;
  specFile: string;
  featureNumber: string;
  featureDir: string;
  repoRoot: string;
  hasGit: boolean;
  templateUsed: boolean;
};

export async function createFeature(options: CreateFeatureOptions): Promise<FeatureResult> {
  const description = options.description.trim();
  if (!description) {
    throw new UsageError("Feature description is required");
  }

  const cwd = path.resolve(options.cwd || process.cwd());
  const vcs = options.vcs ?? createGitVersionControl();
  const log = options.log ?? (() => {});

  const gitRoot = await vcs.discoverRoot(cwd);
  const hasGit = gitRoot !== null;
  const repoRoot = gitRoot ?? path.resolve(options.fallbackRoot ?? (await resolveFallbackRoot(cwd)));

  const config = await loadProjectConfig(repoRoot);
  const slug = slugifyDescription(description, config.branch.words);

  await fs.ensureDir(config.specsDir);
  const existing = await listFeatureDirectories(config.specsDir);

  let number: number;
  if (options.featureNumber !== undefined) {
    number = options.featureNumber;
    const clash = existing.find(name => parseFeaturePrefix(name) === number);
    if (clash) {
      log({ level: "warn", message: `Feature number ${formatFeatureNumber(number)} is already used by ${clash}` });
    }
  } else {
    number = nextFeatureNumber(existing);
  }

  const featureNumber = formatFeatureNumber(number);
  const branchName = buildBranchName(featureNumber, slug);
  if (!slug) {
    log({ level: "warn", message: `Feature description has no letters or digits; using branch name ${branchName}` });
  }

  if (hasGit) {
    await vcs.createBranch(repoRoot, branchName);
  } else {
    log({ level: "warn", message: `Git repository not detected; skipped branch creation for ${branchName}` });
  }

  const featureDir = path.join(config.specsDir, branchName);
  await fs.ensureDir(featureDir);

  const specFile = path.join(featureDir, SPEC_FILENAME);
  const templateUsed = await isFile(config.templatePath);
  if (templateUsed) {
    await fs.copy(config.templatePath, specFile, { overwrite: true });
  } else {
    await fs.ensureFile(specFile);
  }

  return { branchName, specFile, featureNumber, featureDir, repoRoot, hasGit, templateUsed };
}

async function isFile(filePath: string): Promise<boolean> {
  return fs
    .stat(filePath)
    .then(stats => stats.isFile())
    .catch(() => false);
}
