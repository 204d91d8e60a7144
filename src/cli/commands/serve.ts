import { Command, Option } from "clipanion";
import { startServer } from "../../app/lifecycle.js";
import { VERSION } from "../../server/api.js";
import { printBanner } from "../banner.js";

export class ServeCommand extends Command {
  static override paths = [["serve"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the HTTP API (and the rebuild schedule, if configured)",
    examples: [
      ["Start with default config", "readlog serve"],
      ["Start with custom config", "readlog serve --config ./readlog.config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    printBanner(VERSION);

    try {
      // The open server keeps the process alive until SIGINT/SIGTERM.
      await startServer(this.config);
    } catch (err) {
      console.error("Failed to start readlog:", err);
      process.exitCode = 1;
    }
  }
}
