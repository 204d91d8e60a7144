import { Cli } from "clipanion";
import { VERSION } from "../server/api.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { ServeCommand } from "./commands/serve.js";
import { StatsRefreshCommand, StatsShowCommand } from "./commands/stats-cmd.js";
import { TimelineListCommand, TimelineRebuildCommand } from "./commands/timeline-cmd.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "readlog",
    binaryName: "readlog",
    binaryVersion: VERSION,
  });

  cli.register(ServeCommand);

  // Timeline commands
  cli.register(TimelineListCommand);
  cli.register(TimelineRebuildCommand);

  // Stats commands
  cli.register(StatsShowCommand);
  cli.register(StatsRefreshCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
