import type { ResolvedConfig } from "./config.js";
import { requirePortalEndpoints } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import type {
  Clock,
  DelayFn,
  HttpSessionFactory,
  PromptService,
  RandomFn,
  SignalHandler,
  TimerService,
} from "./ports/index.js";
import {
  createNodeFetchSessionFactory,
  mathRandom,
  realDelay,
  realTimerService,
  systemClock,
} from "./adapters/index.js";
import { createAuthenticator, type Authenticator } from "./auth/authenticator.js";
import type { Credentials } from "./auth/context.js";
import { createAuthenticatedTransport, type AuthenticatedTransport } from "./transport.js";

/**
 * Injection points for everything that touches the outside world.
 * Commands fill unset entries with the real adapters.
 */
export interface EngineDeps {
  sessionFactory?: HttpSessionFactory;
  clock?: Clock;
  timers?: TimerService;
  delay?: DelayFn;
  random?: RandomFn;
  logger?: Logger;
}

/** What the commands take on top of the engine's ports */
export interface CommandDeps extends EngineDeps {
  promptService?: PromptService;
  signalHandler?: SignalHandler;
  /** Source of credentials; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

export interface Engine {
  logger: Logger;
  authenticator: Authenticator;
  transport: AuthenticatedTransport;
}

/**
 * Wire the authenticator and transport from resolved configuration.
 */
export function createEngine(
  config: ResolvedConfig,
  credentials: Credentials,
  deps: EngineDeps = {}
): Engine {
  const endpoints = requirePortalEndpoints(config.portal);
  const logger = deps.logger ?? createLogger({ level: config.logLevel, json: config.logJson });

  const authenticator = createAuthenticator({
    endpoints,
    credentials,
    sessionFactory:
      deps.sessionFactory ??
      createNodeFetchSessionFactory({ maxSockets: config.transfer.concurrency * 2 }),
    clock: deps.clock ?? systemClock,
    logger,
    requestTimeoutMs: config.transfer.connectTimeoutMs,
    timers: deps.timers ?? realTimerService,
  });

  const transport = createAuthenticatedTransport({
    authenticator,
    realmUrl: endpoints.realmUrl,
    connectTimeoutMs: config.transfer.connectTimeoutMs,
    readTimeoutMs: config.transfer.readTimeoutMs,
    maxAttempts: config.transfer.maxAttempts,
    retryBaseDelayMs: config.transfer.retryBaseDelayMs,
    retryJitterMs: config.transfer.retryJitterMs,
    logger,
    timers: deps.timers ?? realTimerService,
    delay: deps.delay ?? realDelay,
    random: deps.random ?? mathRandom,
  });

  return { logger, authenticator, transport };
}
