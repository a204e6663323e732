import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  ENV_FEED_URL,
  ENV_OUTPUT_DIR,
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { maybeOutputJson, type ConfigShowJson } from "../lib/json-output.js";
import { errorMessage } from "../lib/errors/types.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# castgrab configuration
# Place at ~/.config/castgrab/config.yaml (user) or /etc/castgrab/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. Environment (${ENV_FEED_URL}, ${ENV_OUTPUT_DIR})
# 3. User config (~/.config/castgrab/config.yaml)
# 4. System config (/etc/castgrab/config.yaml)
# 5. Built-in defaults

feed:
  # RSS feed to list and download from (can be overridden with --feed)
  # url: "https://example.com/podcast.xml"

download:
  # Where episodes are saved (can be overridden with --output-dir)
  outputDir: "~/Downloads"

  # Bytes written between cancellation checks (1024-1048576)
  chunkSize: 8192

  # How long Ctrl-C waits for a download to stop before closing the connection (ms)
  shutdownGraceMs: 5000

  # What to do when the file already exists: ask, always, never
  overwrite: ask

fetch:
  # Give up on a feed request after this long (ms)
  timeoutMs: 30000

# Logging configuration
logging:
  # Log level: debug, info, warn, error
  level: warn

  # Output JSON logs
  json: false
`;

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage castgrab configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/castgrab/config.yaml"
    )
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
        console.log(chalk.gray("Edit this file to set your feed URL."));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${errorMessage(error)}`));
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const pathsToCheck = options.config
        ? [options.config]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (options.config) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          console.error(chalk.red(`  ✗ Invalid: ${errorMessage(error)}`));
          hasErrors = true;
        }
      }

      if (!foundAny && !options.config) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'castgrab config init' to create one.`));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config);

        const summary: ConfigShowJson = { effective: { ...resolved }, sources };
        if (maybeOutputJson(summary)) {
          return;
        }

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));

        if (sources.length > 0) {
          console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
        } else {
          console.log(chalk.gray("Sources: (defaults only)"));
        }

        console.log();
        console.log(chalk.bold("Feed:"));
        console.log(`  url:             ${resolved.feedUrl ?? chalk.gray("(not set)")}`);
        console.log(`  timeoutMs:       ${resolved.fetchTimeoutMs}`);

        console.log();
        console.log(chalk.bold("Download:"));
        console.log(`  outputDir:       ${resolved.outputDir}`);
        console.log(`  chunkSize:       ${resolved.chunkSize}`);
        console.log(`  shutdownGraceMs: ${resolved.shutdownGraceMs}`);
        console.log(`  overwrite:       ${resolved.overwrite}`);

        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  level:           ${resolved.logLevel}`);
        console.log(`  json:            ${resolved.logJson}`);
      } catch (error) {
        console.error(chalk.red(`Failed to load config: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}
