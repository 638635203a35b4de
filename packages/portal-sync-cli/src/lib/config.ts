import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { invalidConfig, missingPortalSetting } from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";
import type { LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path */
export const SYSTEM_CONFIG_PATH = "/etc/portal-sync/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "portal-sync",
  "config.yaml"
);

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  scope: "openid email",
  concurrency: 4,
  connectTimeoutMs: 15_000,
  readTimeoutMs: 60_000,
  maxAttempts: 10,
  retryBaseDelayMs: 5_000,
  retryJitterMs: 1_000,
  roundCooldownMs: 5_000,
  /** 0 = keep retrying failed items until they succeed or the run is cancelled */
  maxRounds: 0,
  destinationDir: "./downloads",
  manifestPath: "portal-sync-manifest.json",
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const PortalSchema = z.object({
  baseUrl: z.string().url().optional(),
  realmUrl: z.string().url().optional(),
  tokenUrl: z.string().url().optional(),
  authorizationUrl: z.string().url().optional(),
  clientId: z.string().min(1).optional(),
  redirectUri: z.string().url().optional(),
  scope: z.string().min(1).optional(),
});

const TransferSchema = z.object({
  concurrency: z.number().int().min(1).max(16).optional(),
  connectTimeoutMs: z.number().int().min(1000).max(300_000).optional(),
  readTimeoutMs: z.number().int().min(1000).max(3_600_000).optional(),
  maxAttempts: z.number().int().min(1).max(50).optional(),
  retryBaseDelayMs: z.number().int().min(0).max(600_000).optional(),
  retryJitterMs: z.number().int().min(0).max(60_000).optional(),
  roundCooldownMs: z.number().int().min(0).max(3_600_000).optional(),
  maxRounds: z.number().int().min(0).max(10_000).optional(),
});

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  portal: PortalSchema.optional(),
  transfer: TransferSchema.optional(),
  crawl: z
    .object({
      include: z.array(z.string().min(1)).optional(),
      excludeDirectories: z.array(z.string().min(1)).optional(),
    })
    .optional(),
  output: z
    .object({
      destinationDir: z.string().min(1).optional(),
      manifestPath: z.string().min(1).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface PortalSettings {
  baseUrl?: string;
  realmUrl?: string;
  tokenUrl?: string;
  authorizationUrl?: string;
  clientId?: string;
  /** Only ever read from the environment */
  clientSecret?: string;
  redirectUri?: string;
  scope: string;
}

export interface TransferSettings {
  concurrency: number;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryJitterMs: number;
  roundCooldownMs: number;
  maxRounds: number;
}

export interface CrawlSettings {
  include: string[];
  excludeDirectories: string[];
}

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  portal: PortalSettings;
  transfer: TransferSettings;
  crawl: CrawlSettings;
  destinationDir: string;
  manifestPath: string;
  logLevel: LogLevel;
  logJson: boolean;
}

/** Values the command line may override */
export interface ConfigOverrides {
  concurrency?: number;
  maxRounds?: number;
  destinationDir?: string;
  manifestPath?: string;
  logLevel?: LogLevel;
  logJson?: boolean;
}

/** Portal endpoints with every required setting present */
export interface PortalEndpoints {
  baseUrl: string;
  realmUrl: string;
  tokenUrl: string;
  authorizationUrl: string;
  clientId: string;
  clientSecret?: string;
  redirectUri: string;
  scope: string;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${errorMessage(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${errorMessage(err)}`]);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.portal) {
    Object.assign(target.portal, filterUndefined(source.portal));
  }
  if (source.transfer) {
    Object.assign(target.transfer, filterUndefined(source.transfer));
  }
  if (source.crawl?.include !== undefined) {
    target.crawl.include = source.crawl.include;
  }
  if (source.crawl?.excludeDirectories !== undefined) {
    target.crawl.excludeDirectories = source.crawl.excludeDirectories;
  }
  if (source.output?.destinationDir !== undefined) {
    target.destinationDir = source.output.destinationDir;
  }
  if (source.output?.manifestPath !== undefined) {
    target.manifestPath = source.output.manifestPath;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

function filterUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > User config > System config > Defaults.
 * The client secret comes only from PORTAL_SYNC_CLIENT_SECRET.
 */
export function resolveConfig(
  cliOptions: ConfigOverrides = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const config: ResolvedConfig = {
    portal: { scope: CONFIG_DEFAULTS.scope },
    transfer: {
      concurrency: CONFIG_DEFAULTS.concurrency,
      connectTimeoutMs: CONFIG_DEFAULTS.connectTimeoutMs,
      readTimeoutMs: CONFIG_DEFAULTS.readTimeoutMs,
      maxAttempts: CONFIG_DEFAULTS.maxAttempts,
      retryBaseDelayMs: CONFIG_DEFAULTS.retryBaseDelayMs,
      retryJitterMs: CONFIG_DEFAULTS.retryJitterMs,
      roundCooldownMs: CONFIG_DEFAULTS.roundCooldownMs,
      maxRounds: CONFIG_DEFAULTS.maxRounds,
    },
    crawl: { include: [], excludeDirectories: [] },
    destinationDir: CONFIG_DEFAULTS.destinationDir,
    manifestPath: CONFIG_DEFAULTS.manifestPath,
    logLevel: "info",
    logJson: false,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  if (env.PORTAL_SYNC_CLIENT_SECRET) {
    config.portal.clientSecret = env.PORTAL_SYNC_CLIENT_SECRET;
  }

  const { concurrency, maxRounds, ...rest } = filterUndefined(cliOptions);
  const limits = TransferSchema.pick({ concurrency: true, maxRounds: true }).safeParse({
    concurrency,
    maxRounds,
  });
  if (!limits.success) {
    throw invalidConfig(
      "command line options",
      limits.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  if (concurrency !== undefined) config.transfer.concurrency = concurrency;
  if (maxRounds !== undefined) config.transfer.maxRounds = maxRounds;
  Object.assign(config, rest);

  return config;
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Optional path to a specific config file
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: ConfigOverrides = {}
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (!userConfig) {
      throw invalidConfig(explicitPath, ["file not found"]);
    }
    sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig);

  return { config, sources };
}

/**
 * Derive the endpoints the authenticator needs, failing on missing settings.
 * Token and authorization endpoints default to the OpenID Connect paths
 * under the realm URL.
 */
export function requirePortalEndpoints(portal: PortalSettings): PortalEndpoints {
  const { baseUrl, realmUrl, clientId } = portal;
  if (!baseUrl) throw missingPortalSetting("baseUrl");
  if (!realmUrl) throw missingPortalSetting("realmUrl");
  if (!clientId) throw missingPortalSetting("clientId");

  const realm = realmUrl.replace(/\/+$/, "");

  return {
    baseUrl,
    realmUrl: realm,
    tokenUrl: portal.tokenUrl ?? `${realm}/token`,
    authorizationUrl: portal.authorizationUrl ?? `${realm}/auth`,
    clientId,
    clientSecret: portal.clientSecret,
    redirectUri: portal.redirectUri ?? new URL("/oauth2callback", baseUrl).toString(),
    scope: portal.scope,
  };
}
