import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { loadConfig, requirePortalEndpoints, type ConfigOverrides, type ResolvedConfig } from "../lib/config.js";
import { createEngine, type CommandDeps, type Engine } from "../lib/engine.js";
import { crawlManifest, createHtmlDirectoryLister } from "../lib/crawler.js";
import { dedupeWorkItems, loadManifest, saveManifest, type WorkItem } from "../lib/manifest.js";
import { createSpinner } from "../lib/progress.js";
import { maybeOutputJson, type CrawlResultJson } from "../lib/json-output.js";
import { isNonInteractive, shouldAutoConfirm } from "../lib/cli-context.js";
import { interactivePrompts } from "../lib/adapters/interactive-prompts.js";
import type { PromptService } from "../lib/ports/prompt.js";
import { resolveCredentials } from "./auth.js";

// ---------------------------------------------------------------------------
// Shared option handling
// ---------------------------------------------------------------------------

export interface TransferCommandOptions {
  config?: string;
  concurrency?: number;
  maxRounds?: number;
  manifest?: string;
  verbose?: boolean;
}

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value) || Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

export function parseConcurrency(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 1 || parsed > 16) {
    throw new InvalidArgumentError("Expected a number of parallel transfers from 1 to 16.");
  }
  return parsed;
}

export function toOverrides(
  destination: string | undefined,
  options: TransferCommandOptions
): ConfigOverrides {
  return {
    destinationDir: destination,
    concurrency: options.concurrency,
    maxRounds: options.maxRounds,
    manifestPath: options.manifest,
    logLevel: options.verbose ? "debug" : undefined,
  };
}

/**
 * Load configuration and credentials, then authenticate.
 * Rejects with AUTH_FAILED before any transfer starts.
 */
export async function openEngine(
  destination: string | undefined,
  options: TransferCommandOptions,
  deps: CommandDeps
): Promise<{ config: ResolvedConfig; engine: Engine }> {
  const { config } = loadConfig(options.config, toOverrides(destination, options));
  requirePortalEndpoints(config.portal);
  const credentials = await resolveCredentials({
    env: deps.env,
    nonInteractive: isNonInteractive(),
    promptService: deps.promptService,
  });
  const engine = createEngine(config, credentials, deps);

  const spinner = createSpinner("Logging in").start();
  try {
    await engine.transport.start();
  } catch (error) {
    spinner.fail("Login failed");
    engine.transport.close();
    throw error;
  }
  spinner.succeed("Logged in");

  return { config, engine };
}

// ---------------------------------------------------------------------------
// Crawl
// ---------------------------------------------------------------------------

/**
 * Walk the portal listing, dedupe the result and save it as the cache.
 */
export async function crawlAndSave(
  config: ResolvedConfig,
  engine: Engine,
  signal?: AbortSignal
): Promise<{ items: WorkItem[]; removed: number }> {
  const rootUrl = requirePortalEndpoints(config.portal).baseUrl;
  const spinner = createSpinner("Crawling listings").start();

  const crawled = await crawlManifest(createHtmlDirectoryLister(engine.transport), {
    rootUrl,
    destinationDir: config.destinationDir,
    include: config.crawl.include,
    excludeDirectories: config.crawl.excludeDirectories,
    logger: engine.logger,
    signal,
    onDirectory: (url) => {
      spinner.text = `Crawling ${url}`;
    },
  });

  const { items, removed } = dedupeWorkItems(crawled);
  await saveManifest(config.manifestPath, items);
  spinner.succeed(`Found ${items.length} files`);

  return { items, removed };
}

export interface ManifestChoice {
  rescan?: boolean;
  signal?: AbortSignal;
  promptService?: PromptService;
}

/**
 * Reuse the cached manifest when there is one (asking first unless
 * confirmations are automatic), otherwise crawl.
 */
export async function obtainManifest(
  config: ResolvedConfig,
  engine: Engine,
  choice: ManifestChoice = {}
): Promise<{ items: WorkItem[]; fromCache: boolean }> {
  if (!choice.rescan) {
    const cached = await loadManifest(config.manifestPath);
    if (cached && cached.length > 0) {
      const prompt = choice.promptService ?? interactivePrompts;
      const reuse =
        shouldAutoConfirm() || isNonInteractive()
          ? true
          : await prompt.confirm(
              `Reuse ${cached.length} entries from ${config.manifestPath}?`,
              true
            );
      if (reuse) {
        engine.logger.info("Using cached manifest", {
          path: config.manifestPath,
          items: cached.length,
        });
        return { items: cached, fromCache: true };
      }
    }
  }

  const { items } = await crawlAndSave(config, engine, choice.signal);
  return { items, fromCache: false };
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function addTransferOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", "Specific config file to use")
    .option("-m, --manifest <path>", "Manifest cache file")
    .option("--concurrency <n>", "Parallel transfers (1-16)", parseConcurrency)
    .option("--max-rounds <n>", "Stop after this many rounds (0 = no limit)", parseInteger)
    .option("-v, --verbose", "Debug logging");
}

export function registerCrawlCommands(program: Command, deps: CommandDeps = {}): void {
  addTransferOptions(
    program
      .command("crawl")
      .description("Build the manifest cache from the portal listing without downloading")
      .argument("[destination]", "Local directory the manifest points into")
  ).action(async (destination: string | undefined, options: TransferCommandOptions) => {
    const { config, engine } = await openEngine(destination, options, deps);
    try {
      const { items, removed } = await crawlAndSave(config, engine);

      const result: CrawlResultJson = {
        manifestPath: config.manifestPath,
        items: items.length,
        duplicatesRemoved: removed,
      };
      if (!maybeOutputJson(result)) {
        console.log(chalk.green(`Saved ${items.length} entries to ${config.manifestPath}`));
      }
    } finally {
      engine.transport.close();
    }
  });
}
