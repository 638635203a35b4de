#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { initContext } from "./lib/cli-context.js";
import { renderError } from "./lib/errors/renderer.js";
import { registerAuthCommands } from "./modules/auth.js";
import { registerCrawlCommands } from "./modules/crawl.js";
import { registerSyncCommands } from "./modules/sync.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import type { CommandDeps } from "./lib/engine.js";

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  return PackageJsonSchema.parse(raw).version;
}

export async function main(argv = process.argv, deps: CommandDeps = {}): Promise<void> {
  initContext(argv);

  const program = new Command()
    .name("portal-sync")
    .description("Mirror a file tree from an authenticated web portal")
    .version(readVersion())
    .option("--json", "Machine-readable JSON output")
    .option("-q, --quiet", "No spinners or progress output")
    .option("-y, --yes", "Reuse the cached manifest without asking")
    .option("--no-input", "Never prompt; fail when input would be needed");

  registerAuthCommands(program, deps);
  registerCrawlCommands(program, deps);
  registerSyncCommands(program, deps);
  registerConfigCommands(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderError(error);
    process.exitCode = 1;
  }
}

void main();
