import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { registerConfigCommands } from "./config-cmd.js";

// Mock fs module
vi.mock("fs", () => ({
  existsSync: vi.fn(),
  mkdirSync: vi.fn(),
  writeFileSync: vi.fn(),
}));

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => ({
  default: {
    red: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    cyan: (s: string) => s,
    gray: (s: string) => s,
    bold: (s: string) => s,
  },
}));

// Mock config module
vi.mock("../lib/config.js", () => ({
  loadConfig: vi.fn(),
  loadConfigFile: vi.fn(),
  USER_CONFIG_PATH: "/home/user/.config/portal-sync/config.yaml",
  SYSTEM_CONFIG_PATH: "/etc/portal-sync/config.yaml",
}));

import { parse as parseYaml } from "yaml";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { loadConfig, loadConfigFile, type ResolvedConfig } from "../lib/config.js";

function resolvedConfig(overrides: Partial<ResolvedConfig> = {}): ResolvedConfig {
  return {
    portal: {
      baseUrl: "https://data.example.org/files/",
      realmUrl: "https://auth.example.org/realms/demo/protocol/openid-connect",
      clientId: "portal-client",
      scope: "openid email",
    },
    transfer: {
      concurrency: 4,
      connectTimeoutMs: 15000,
      readTimeoutMs: 60000,
      maxAttempts: 10,
      retryBaseDelayMs: 5000,
      retryJitterMs: 1000,
      roundCooldownMs: 5000,
      maxRounds: 0,
    },
    crawl: { include: [".tif"], excludeDirectories: ["thumbnails"] },
    destinationDir: "./downloads",
    manifestPath: "portal-sync-manifest.json",
    logLevel: "info",
    logJson: false,
    ...overrides,
  };
}

describe("config-cmd", () => {
  let program: Command;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    program = new Command();
    program.exitOverride();
    registerConfigCommands(program);

    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    vi.clearAllMocks();
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe("config init", () => {
    it("writes an example that passes validation and carries no credentials", async () => {
      vi.mocked(existsSync).mockReturnValue(false);
      const { ConfigFileSchema } =
        await vi.importActual<typeof import("../lib/config.js")>("../lib/config.js");

      await program.parseAsync(["node", "test", "config", "init"]);

      expect(mkdirSync).toHaveBeenCalledWith("/home/user/.config/portal-sync", { recursive: true });
      const [path, content] = vi.mocked(writeFileSync).mock.calls[0];
      expect(path).toBe("/home/user/.config/portal-sync/config.yaml");

      const parsed = ConfigFileSchema.parse(parseYaml(String(content)));
      expect(parsed.portal?.clientId).toBe("portal-client");
      expect(parsed.transfer?.maxRounds).toBe(0);
      expect(parsed.crawl?.include).toEqual([".tif"]);
      expect(String(content)).not.toMatch(/^\s*(username|password):/m);
      expect(consoleLogSpy).toHaveBeenCalledWith(
        "Created config file: /home/user/.config/portal-sync/config.yaml"
      );
    });

    it("leaves an existing file alone", async () => {
      vi.mocked(existsSync).mockReturnValue(true);

      await program.parseAsync(["node", "test", "config", "init", "--global"]);

      expect(writeFileSync).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "Config file already exists: /etc/portal-sync/config.yaml"
      );
      expect(process.exitCode).toBe(1);
    });

    it("hints at sudo when the system file cannot be written", async () => {
      vi.mocked(existsSync).mockReturnValue(false);
      vi.mocked(mkdirSync).mockImplementationOnce(() => {
        throw new Error("EACCES: permission denied");
      });

      await program.parseAsync(["node", "test", "config", "init", "--global"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "Failed to create config: EACCES: permission denied"
      );
      expect(consoleErrorSpy).toHaveBeenCalledWith("System config may require sudo.");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("config validate", () => {
    it("reports the schema issues of a specific file", async () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(loadConfigFile).mockImplementationOnce(() => {
        throw new Error("Configuration in /custom/config.yaml has errors");
      });

      await program.parseAsync(["node", "test", "config", "validate", "-c", "/custom/config.yaml"]);

      expect(loadConfigFile).toHaveBeenCalledWith("/custom/config.yaml");
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "  ✗ Invalid: Configuration in /custom/config.yaml has errors"
      );
      expect(process.exitCode).toBe(1);
    });

    it("checks the system file before the user file", async () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(loadConfigFile).mockReturnValue({});

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(vi.mocked(loadConfigFile).mock.calls.map(([path]) => path)).toEqual([
        "/etc/portal-sync/config.yaml",
        "/home/user/.config/portal-sync/config.yaml",
      ]);
      expect(consoleLogSpy).toHaveBeenCalledWith("\nAll configuration files are valid.");
    });

    it("points at config init when nothing exists", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("Run 'portal-sync config init' to create one.");
      expect(process.exitCode).toBeUndefined();
    });
  });

  describe("config show", () => {
    it("displays effective configuration", async () => {
      vi.mocked(loadConfig).mockReturnValue({
        config: resolvedConfig(),
        sources: ["/home/user/.config/portal-sync/config.yaml"],
      });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("Effective Configuration:");
      expect(consoleLogSpy).toHaveBeenCalledWith(
        "Sources: /home/user/.config/portal-sync/config.yaml"
      );
      expect(consoleLogSpy).toHaveBeenCalledWith(
        "  baseUrl:          https://data.example.org/files/"
      );
      expect(consoleLogSpy).toHaveBeenCalledWith("  concurrency:      4");
      expect(consoleLogSpy).toHaveBeenCalledWith("  maxRounds:        unlimited");
      expect(consoleLogSpy).toHaveBeenCalledWith("  - .tif");
      expect(consoleLogSpy).toHaveBeenCalledWith("  skip thumbnails/");
    });

    it("never prints the client secret", async () => {
      const config = resolvedConfig();
      config.portal.clientSecret = "test-secret";
      vi.mocked(loadConfig).mockReturnValue({ config, sources: [] });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("  clientSecret:     (set)");
      const printed = consoleLogSpy.mock.calls.map((call) => String(call[0]));
      expect(printed.filter((line) => line.includes("test-secret"))).toEqual([]);
    });

    it("flags missing portal settings", async () => {
      vi.mocked(loadConfig).mockReturnValue({
        config: resolvedConfig({ portal: { scope: "openid email" } }),
        sources: [],
      });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("  baseUrl:          (not set)");
    });

    it("shows defaults only message when no sources", async () => {
      vi.mocked(loadConfig).mockReturnValue({
        config: resolvedConfig({ crawl: { include: [], excludeDirectories: [] } }),
        sources: [],
      });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("Sources: (defaults only)");
      expect(consoleLogSpy).toHaveBeenCalledWith("  include:          (everything)");
    });

    it("handles config loading errors", async () => {
      vi.mocked(loadConfig).mockImplementation(() => {
        throw new Error("Config parse error");
      });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "Failed to load config: Config parse error"
      );
      expect(process.exitCode).toBe(1);
    });

    it("uses custom config path with -c option", async () => {
      vi.mocked(loadConfig).mockReturnValue({ config: resolvedConfig(), sources: [] });

      await program.parseAsync([
        "node",
        "test",
        "config",
        "show",
        "-c",
        "/custom/config.yaml",
      ]);

      expect(loadConfig).toHaveBeenCalledWith("/custom/config.yaml");
    });
  });

  describe("config path", () => {
    it("lists both locations with their state", async () => {
      vi.mocked(existsSync).mockImplementation((path) => String(path).startsWith("/etc/"));

      await program.parseAsync(["node", "test", "config", "path"]);

      expect(consoleLogSpy.mock.calls.map((call) => call[0])).toEqual([
        "Configuration file locations:",
        undefined,
        "User config:",
        "  /home/user/.config/portal-sync/config.yaml",
        "  (not found)",
        undefined,
        "System config:",
        "  /etc/portal-sync/config.yaml",
        "  (exists)",
      ]);
    });
  });
});
