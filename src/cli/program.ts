import { Cli } from "clipanion";
import { ComputeCommand } from "./commands/compute.js";
import { SummaryCommand } from "./commands/summary.js";
import {
  ConfigShowCommand,
  ConfigValidateCommand,
} from "./commands/config-cmd.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Chat Wrapped",
    binaryName: "wrapped",
    binaryVersion: "0.1.0",
  });

  cli.register(ComputeCommand);
  cli.register(SummaryCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
