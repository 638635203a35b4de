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
import { errorMessage } from "../lib/errors/types.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

const EXAMPLE_CONFIG = `# portal-sync configuration
# Place at ~/.config/portal-sync/config.yaml (user) or /etc/portal-sync/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. User config (~/.config/portal-sync/config.yaml)
# 3. System config (/etc/portal-sync/config.yaml)
# 4. Built-in defaults
#
# Credentials are never read from this file. Set PORTAL_SYNC_USERNAME and
# PORTAL_SYNC_PASSWORD, or answer the prompts. A confidential client's secret
# goes in PORTAL_SYNC_CLIENT_SECRET.

portal:
  # Root of the protected file listing
  baseUrl: "https://data.example.org/files/"

  # OpenID Connect realm of the identity provider
  realmUrl: "https://auth.example.org/realms/example/protocol/openid-connect"

  clientId: "portal-client"

  # Derived from realmUrl when omitted
  # tokenUrl: "https://auth.example.org/realms/example/protocol/openid-connect/token"
  # authorizationUrl: "https://auth.example.org/realms/example/protocol/openid-connect/auth"

  # Defaults to <baseUrl origin>/oauth2callback
  # redirectUri: "https://data.example.org/oauth2callback"

  scope: "openid email"

transfer:
  # Parallel transfers (1-16)
  concurrency: 4

  # Time allowed to receive response headers (ms)
  connectTimeoutMs: 15000

  # Longest pause between two body chunks (ms)
  readTimeoutMs: 60000

  # Attempts per request before the transfer fails for this round
  maxAttempts: 10

  # Linear backoff: retryBaseDelayMs * attempt + up to retryJitterMs
  retryBaseDelayMs: 5000
  retryJitterMs: 1000

  # Pause between rounds (ms)
  roundCooldownMs: 5000

  # 0 keeps retrying until every file is transferred
  maxRounds: 0

crawl:
  # File name suffixes to download; empty downloads everything
  include:
    - ".tif"

  # Directory names never descended into
  excludeDirectories: []

output:
  destinationDir: "./downloads"
  manifestPath: "portal-sync-manifest.json"

logging:
  # Log level: debug, info, warn, error
  level: info

  # Output JSON logs (recommended for cron and systemd)
  json: false
`;

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage portal-sync configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/portal-sync/config.yaml"
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
        console.log(chalk.gray("Edit this file to customize your settings."));
      } catch (error) {
        console.error(
          chalk.red(`Failed to create config: ${errorMessage(error)}`)
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
        console.log(chalk.gray(`Run 'portal-sync config init' to create one.`));
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

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));

        if (sources.length > 0) {
          console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
        } else {
          console.log(chalk.gray("Sources: (defaults only)"));
        }

        const { portal, transfer, crawl } = resolved;

        console.log();
        console.log(chalk.bold("Portal:"));
        console.log(`  baseUrl:          ${portal.baseUrl ?? chalk.yellow("(not set)")}`);
        console.log(`  realmUrl:         ${portal.realmUrl ?? chalk.yellow("(not set)")}`);
        console.log(`  clientId:         ${portal.clientId ?? chalk.yellow("(not set)")}`);
        console.log(`  clientSecret:     ${portal.clientSecret ? "(set)" : "(not set)"}`);
        console.log(`  scope:            ${portal.scope}`);

        console.log();
        console.log(chalk.bold("Transfer:"));
        console.log(`  concurrency:      ${transfer.concurrency}`);
        console.log(`  connectTimeoutMs: ${transfer.connectTimeoutMs}`);
        console.log(`  readTimeoutMs:    ${transfer.readTimeoutMs}`);
        console.log(`  maxAttempts:      ${transfer.maxAttempts}`);
        console.log(`  retryBaseDelayMs: ${transfer.retryBaseDelayMs}`);
        console.log(`  retryJitterMs:    ${transfer.retryJitterMs}`);
        console.log(`  roundCooldownMs:  ${transfer.roundCooldownMs}`);
        console.log(`  maxRounds:        ${transfer.maxRounds === 0 ? "unlimited" : transfer.maxRounds}`);

        console.log();
        console.log(chalk.bold("Crawl:"));
        if (crawl.include.length === 0) {
          console.log("  include:          (everything)");
        }
        for (const suffix of crawl.include) {
          console.log(`  - ${suffix}`);
        }
        for (const name of crawl.excludeDirectories) {
          console.log(`  skip ${name}/`);
        }

        console.log();
        console.log(chalk.bold("Output:"));
        console.log(`  destinationDir:   ${resolved.destinationDir}`);
        console.log(`  manifestPath:     ${resolved.manifestPath}`);

        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  level:            ${resolved.logLevel}`);
        console.log(`  json:             ${resolved.logJson}`);
      } catch (error) {
        console.error(
          chalk.red(`Failed to load config: ${errorMessage(error)}`)
        );
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
