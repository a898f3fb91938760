import { Command } from "clipanion";
import { GitCommandError, UsageError } from "@specflow/core";
import type { FeatureLogEvent } from "@specflow/core";

export const LOG_TAG = "[specflow]";

export abstract class SpecflowCommand extends Command {
  protected abstract readonly commandName: string;

  protected warn(message: string): void {
    this.context.stderr.write(`${LOG_TAG} Warning: ${message}\n`);
  }

  protected handleLogEvent = (event: FeatureLogEvent): void => {
    if (event.level === "warn") {
      this.warn(event.message);
    }
  };

  /** Writes a one-line diagnostic for `error` and returns the exit code to use. */
  protected reportError(error: unknown): number {
    if (error instanceof UsageError) {
      this.context.stderr.write(`Error: ${error.message}\n`);
      return 1;
    }
    if (error instanceof GitCommandError) {
      this.context.stderr.write(`${error.message}\n`);
      return error.exitCode > 0 ? error.exitCode : 1;
    }
    const message = error instanceof Error ? error.message : String(error);
    this.context.stderr.write(`${this.commandName} failed: ${message}\n`);
    return 1;
  }
}
