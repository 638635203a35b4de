import { Command } from "commander";
import chalk from "chalk";
import { loadConfig, requirePortalEndpoints } from "../lib/config.js";
import { createEngine, type CommandDeps } from "../lib/engine.js";
import { createSpinner } from "../lib/progress.js";
import { maybeOutputJson, type AuthVerifyJson } from "../lib/json-output.js";
import { isNonInteractive } from "../lib/cli-context.js";
import { authenticationFailed, credentialsMissing } from "../lib/errors/catalog.js";
import type { PromptService } from "../lib/ports/prompt.js";
import type { Credentials } from "../lib/auth/context.js";
import { interactivePrompts } from "../lib/adapters/interactive-prompts.js";

export interface CredentialOptions {
  env?: NodeJS.ProcessEnv;
  nonInteractive: boolean;
  promptService?: PromptService;
}

/**
 * Credentials come from PORTAL_SYNC_USERNAME / PORTAL_SYNC_PASSWORD,
 * with a prompt for whichever is missing.
 */
export async function resolveCredentials(options: CredentialOptions): Promise<Credentials> {
  const env = options.env ?? process.env;
  let username = env.PORTAL_SYNC_USERNAME || undefined;
  let password = env.PORTAL_SYNC_PASSWORD || undefined;

  if (!username || !password) {
    if (options.nonInteractive) {
      throw credentialsMissing();
    }
    const prompt = options.promptService ?? interactivePrompts;
    username ??= await prompt.text("Portal username");
    password ??= await prompt.password("Portal password");
  }

  if (!username || !password) {
    throw credentialsMissing();
  }

  return Object.freeze({ username, password });
}

export function registerAuthCommands(program: Command, deps: CommandDeps = {}): void {
  const auth = program.command("auth").description("Check portal authentication");

  auth
    .command("verify")
    .description("Log in once and check that the portal accepts the session")
    .option("-c, --config <path>", "Specific config file to use")
    .action(async (options: { config?: string }) => {
      const { config } = loadConfig(options.config);
      const endpoints = requirePortalEndpoints(config.portal);
      const credentials = await resolveCredentials({
        env: deps.env,
        nonInteractive: isNonInteractive(),
        promptService: deps.promptService,
      });
      const { authenticator } = createEngine(config, credentials, deps);

      const spinner = createSpinner(`Logging in to ${endpoints.baseUrl}`).start();
      const context = await authenticator.establish();
      if (!context) {
        spinner.fail("Login failed");
        throw authenticationFailed();
      }
      context.session.close();
      spinner.succeed("Logged in");

      const result: AuthVerifyJson = {
        authenticated: true,
        method: context.bearerToken ? "bearer" : "session",
        portal: endpoints.baseUrl,
      };
      if (!maybeOutputJson(result)) {
        console.log(chalk.green(`Authenticated (${result.method}) at ${result.portal}`));
      }
    });
}
