import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# cmorph-sync configuration
# Place at ~/.config/cmorph-sync/config.yaml (user) or /etc/cmorph-sync/config.yaml (system)
#
# Precedence (highest to lowest):
# 1. CLI flags
# 2. Environment (AUSREFDIR)
# 3. User config
# 4. System config
# 5. Built-in defaults
#
# The RDA password is never read from here: export RDAPSWD instead.

# Root of the reference data tree; files go under <dataRoot>/cmorph/data
# dataRoot: /g/data/ia39/aus-ref-clim-data-nci

remote:
  baseUrl: https://rda.ucar.edu/data/ds502.2/
  loginUrl: https://rda.ucar.edu/cgi-bin/login

logging:
  # Log level: debug, info, warn, error
  level: info

  # Write JSON lines instead of plain text
  json: false

  # Defaults to <dataRoot>/cmorph/code/update_log.txt
  # file: /path/to/update_log.txt
`;

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage cmorph-sync configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option("-g, --global", `Create system-wide config at ${SYSTEM_CONFIG_PATH}`)
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
      } catch (error) {
        console.error(
          chalk.red(`Failed to create config: ${error instanceof Error ? error.message : String(error)}`)
        );
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
        try {
          loadConfigFile(path);
          console.log(chalk.green(`✓ ${path}`));
        } catch (error) {
          console.error(chalk.red(`✗ ${path}: ${error instanceof Error ? error.message : String(error)}`));
          hasErrors = true;
        }
      }

      if (hasErrors) {
        process.exitCode = 1;
      } else if (!foundAny) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray("Run 'cmorph-sync config init' to create one."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig({}, options.config);

        console.log(chalk.cyan("Effective configuration:"));
        console.log(
          chalk.gray(`Sources: ${sources.length > 0 ? sources.join(", ") : "(defaults only)"}`)
        );
        console.log(`  dataDir:   ${resolved.dataDir}`);
        console.log(`  baseUrl:   ${resolved.baseUrl}`);
        console.log(`  loginUrl:  ${resolved.loginUrl}`);
        console.log(`  logFile:   ${resolved.logFile}`);
        console.log(`  logLevel:  ${resolved.logLevel}`);
        console.log(`  logJson:   ${resolved.logJson}`);
      } catch (error) {
        console.error(
          chalk.red(`Failed to load config: ${error instanceof Error ? error.message : String(error)}`)
        );
        process.exitCode = 1;
      }
    });
}
