import { Command, Option } from "clipanion";
import {
  createFeature,
  createGitVersionControl,
  parseFeatureNumberOption,
  type FeatureResult,
  type VersionControl,
} from "@specflow/core";
import { SpecflowCommand } from "./base.js";

export const CREATE_FEATURE_USAGE =
  "Usage: create-new-feature [--json] [--feature-num NUMBER(1-999)] <feature_description>";

type VersionControlFactory = () => VersionControl;

let versionControlFactory: VersionControlFactory = () => createGitVersionControl();

export function __setVersionControlFactory(factory: VersionControlFactory) {
  versionControlFactory = factory;
}

export function __resetVersionControlFactory() {
  versionControlFactory = () => createGitVersionControl();
}

export class CreateFeatureCommand extends SpecflowCommand {
  static paths = [Command.Default];

  static usage = Command.Usage({
    description: "Create a numbered feature branch and spec directory",
    details: `
      Derives \`NNN-first-three-words\` from the description, creates that branch when the project is under git, and writes \`specs/<branch>/spec.md\` from \`templates/spec-template.md\` (or an empty file).

      Feature numbers continue from the highest numeric prefix under the specs root unless \`--feature-num\` is given.
    `,
    examples: [
      ["Start a feature", "$0 User Authentication System"],
      ["Machine-readable output", "$0 --json Payment Processing Integration"],
      ["Pin the feature number", "$0 --feature-num 12 Advanced search filters"],
    ],
  });

  protected readonly commandName = "create-new-feature";

  args = Option.Proxy();

  async execute() {
    try {
      const parsed = parseCreateFeatureArgs(this.args);
      if (parsed.help) {
        this.context.stdout.write(`${CREATE_FEATURE_USAGE}\n`);
        return 0;
      }

      const description = parsed.words.join(" ").trim();
      if (!description) {
        this.context.stderr.write(`${CREATE_FEATURE_USAGE}\n`);
        return 1;
      }

      const fallbackRoot = this.context.env.SPECFLOW_ROOT?.trim() || undefined;
      const result = await createFeature({
        description,
        featureNumber: parsed.featureNumber,
        cwd: process.cwd(),
        vcs: versionControlFactory(),
        fallbackRoot,
        log: this.handleLogEvent,
      });

      this.context.stdout.write(formatFeatureResult(result, parsed.json));
      return 0;
    } catch (error) {
      return this.reportError(error);
    }
  }
}

export type CreateFeatureArgs =
  | { help: true }
  | { help: false; json: boolean; featureNumber: number | undefined; words: string[] };

const FEATURE_NUM_FLAG = "--feature-num";

/**
 * Flags are recognised anywhere on the command line; every other token,
 * dash-led or not, is a word of the description.
 */
export function parseCreateFeatureArgs(tokens: readonly string[]): CreateFeatureArgs {
  let json = false;
  let featureNumber: number | undefined;
  const words: string[] = [];

  for (let index = 0; index < tokens.length; index++) {
    const token = tokens[index];
    if (token === "--help" || token === "-h") {
      return { help: true };
    }
    if (token === "--json") {
      json = true;
    } else if (token === FEATURE_NUM_FLAG) {
      featureNumber = parseFeatureNumberOption(tokens[index + 1]);
      index++;
    } else if (token.startsWith(`${FEATURE_NUM_FLAG}=`)) {
      featureNumber = parseFeatureNumberOption(token.slice(FEATURE_NUM_FLAG.length + 1));
    } else {
      words.push(token);
    }
  }

  return { help: false, json, featureNumber, words };
}

export function formatFeatureResult(result: FeatureResult, json: boolean): string {
  if (json) {
    const payload = {
      BRANCH_NAME: result.branchName,
      SPEC_FILE: result.specFile,
      FEATURE_NUM: result.featureNumber,
    };
    return `${JSON.stringify(payload)}\n`;
  }
  return [
    `BRANCH_NAME: ${result.branchName}`,
    `SPEC_FILE: ${result.specFile}`,
    `FEATURE_NUM: ${result.featureNumber}`,
    "",
  ].join("\n");
}
