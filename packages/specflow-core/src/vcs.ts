import { execa } from "execa";
import { GitCommandError } from "./errors.js";

export interface VersionControl {
  /** Top-level directory of the working tree containing `cwd`, or null outside one. */
  discoverRoot(cwd: string): Promise<string | null>;
  createBranch(root: string, name: string): Promise<void>;
}

export type GitRunner = (args: string[], options: { cwd: string }) => Promise<{ stdout: string }>;

export type GitVersionControlOptions = {
  run?: GitRunner;
};

const defaultRunner: GitRunner = async (args, options) => {
  const env: NodeJS.ProcessEnv = { ...process.env, GIT_TERMINAL_PROMPT: "0" };
  const { stdout } = await execa("git", args, { cwd: options.cwd, env });
  return { stdout };
};

export function createGitVersionControl(options: GitVersionControlOptions = {}): VersionControl {
  const run = options.run ?? defaultRunner;
  return {
    async discoverRoot(cwd) {
      try {
        const { stdout } = await run(["rev-parse", "--show-toplevel"], { cwd });
        const root = stdout.trim();
        return root || null;
      } catch {
        return null;
      }
    },
    async createBranch(root, name) {
      const args = ["checkout", "-b", name];
      try {
        await run(args, { cwd: root });
      } catch (error) {
        throw toGitCommandError(args, error);
      }
    },
  };
}

export function createNoopVersionControl(): VersionControl {
  return {
    async discoverRoot() {
      return null;
    },
    async createBranch() {},
  };
}

function toGitCommandError(args: string[], error: unknown): GitCommandError {
  if (error instanceof GitCommandError) {
    return error;
  }
  const exitCode = readNumber(error, "exitCode") ?? 1;
  const stderr = (readString(error, "stderr") ?? "").trim();
  const message = stderr || readString(error, "shortMessage") || (error instanceof Error ? error.message : String(error));
  return new GitCommandError(args, exitCode, stderr, message.trim());
}

function readNumber(value: unknown, key: string): number | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "number" ? field : undefined;
}

function readString(value: unknown, key: string): string | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : undefined;
}
