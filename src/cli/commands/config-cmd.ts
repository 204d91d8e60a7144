import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { loadConfig, substituteEnv } from "../../config/loader.js";
import { getConfigPath, getStateDir, resolveDatabasePath } from "../../config/paths.js";
import { parseConfig } from "../../config/schema.js";
import { errorMessage } from "../../errors.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration, defaults applied",
    examples: [["Show config", "readlog config show"]],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    let config;
    try {
      config = loadConfig(this.config);
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    const effective = {
      ...config,
      stateDir: getStateDir(),
      databasePath: resolveDatabasePath(getStateDir(), config.database),
    };
    this.context.stdout.write(JSON.stringify(effective, null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "readlog config validate"],
      ["Validate specific file", "readlog config validate ./readlog.config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    try {
      const raw = JSON.parse(substituteEnv(content)) as unknown;
      parseConfig(raw);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
    } catch (err) {
      this.context.stdout.write(`Config is INVALID: ${configPath}\n  ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}
