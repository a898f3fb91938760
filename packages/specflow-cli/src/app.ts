import { Builtins, Cli } from "clipanion";
import { CreateFeatureCommand } from "./commands/create-feature.js";

export const BINARY_NAME = "create-new-feature";
export const BINARY_VERSION = "0.1.0";

export function createCli(): Cli {
  const cli = new Cli({ binaryLabel: "specflow", binaryName: BINARY_NAME, binaryVersion: BINARY_VERSION });
  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);
  cli.register(CreateFeatureCommand);
  return cli;
}
