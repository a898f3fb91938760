export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class ConfigError extends Error {
  readonly configPath: string;

  constructor(configPath: string, message: string) {
    super(`${configPath}: ${message}`);
    this.name = "ConfigError";
    this.configPath = configPath;
  }
}

export class GitCommandError extends Error {
  readonly args: string[];
  readonly exitCode: number;
  readonly stderr: string;

  constructor(args: string[], exitCode: number, stderr: string, message?: string) {
    super(message ?? (stderr || `git ${args.join(" ")} exited with code ${exitCode}`));
    this.name = "GitCommandError";
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}
