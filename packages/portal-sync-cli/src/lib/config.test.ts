import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  resolveConfig,
  loadConfigFile,
  requirePortalEndpoints,
  ConfigFileSchema,
  CONFIG_DEFAULTS,
} from "./config.js";
import { SyncError } from "./errors/types.js";

// Mock fs module
vi.mock("fs", () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

import { existsSync, readFileSync } from "fs";

describe("config", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe("resolveConfig", () => {
    it("returns defaults when no config provided", () => {
      const config = resolveConfig({}, undefined, undefined, {});

      expect(config.transfer.concurrency).toBe(CONFIG_DEFAULTS.concurrency);
      expect(config.transfer.maxAttempts).toBe(10);
      expect(config.transfer.connectTimeoutMs).toBe(15_000);
      expect(config.transfer.readTimeoutMs).toBe(60_000);
      expect(config.transfer.maxRounds).toBe(0);
      expect(config.portal.scope).toBe("openid email");
      expect(config.portal.baseUrl).toBeUndefined();
      expect(config.crawl).toEqual({ include: [], excludeDirectories: [] });
      expect(config.logLevel).toBe("info");
      expect(config.logJson).toBe(false);
    });

    it("user config overrides system config", () => {
      const systemConfig = { transfer: { concurrency: 2, maxRounds: 3 } };
      const userConfig = { transfer: { concurrency: 6 } };

      const config = resolveConfig({}, userConfig, systemConfig, {});

      expect(config.transfer.concurrency).toBe(6);
      expect(config.transfer.maxRounds).toBe(3);
    });

    it("CLI options override all configs", () => {
      const userConfig = {
        transfer: { concurrency: 6, maxRounds: 3 },
        output: { destinationDir: "/data/from-file" },
      };

      const config = resolveConfig(
        { concurrency: 1, maxRounds: 9, destinationDir: "/data/from-cli" },
        userConfig,
        undefined,
        {}
      );

      expect(config.transfer.concurrency).toBe(1);
      expect(config.transfer.maxRounds).toBe(9);
      expect(config.destinationDir).toBe("/data/from-cli");
    });

    it("rejects command line values outside the allowed range", () => {
      expect(() => resolveConfig({ concurrency: 0 }, undefined, undefined, {})).toThrow(
        expect.objectContaining({
          code: "CONFIG_INVALID",
          message: "Configuration in command line options has errors",
          details: "concurrency: Number must be greater than or equal to 1",
        })
      );
      expect(() => resolveConfig({ concurrency: 17 }, undefined, undefined, {})).toThrow(
        expect.objectContaining({ code: "CONFIG_INVALID" })
      );
    });

    it("merges portal settings field by field", () => {
      const systemConfig = {
        portal: { baseUrl: "https://data.example.org/files/", clientId: "system-client" },
      };
      const userConfig = { portal: { clientId: "user-client" } };

      const config = resolveConfig({}, userConfig, systemConfig, {});

      expect(config.portal.baseUrl).toBe("https://data.example.org/files/");
      expect(config.portal.clientId).toBe("user-client");
      expect(config.portal.scope).toBe("openid email");
    });

    it("reads the client secret from the environment only", () => {
      const config = resolveConfig({}, undefined, undefined, {
        PORTAL_SYNC_CLIENT_SECRET: "test-secret",
      });

      expect(config.portal.clientSecret).toBe("test-secret");
    });

    it("applies crawl filters and logging", () => {
      const config = resolveConfig(
        {},
        {
          crawl: { include: [".tif.gz"], excludeDirectories: ["old"] },
          logging: { level: "debug", json: true },
        },
        undefined,
        {}
      );

      expect(config.crawl.include).toEqual([".tif.gz"]);
      expect(config.crawl.excludeDirectories).toEqual(["old"]);
      expect(config.logLevel).toBe("debug");
      expect(config.logJson).toBe(true);
    });
  });

  describe("ConfigFileSchema", () => {
    it("accepts an empty config", () => {
      expect(ConfigFileSchema.safeParse({}).success).toBe(true);
    });

    it("rejects concurrency above 16", () => {
      const result = ConfigFileSchema.safeParse({ transfer: { concurrency: 40 } });
      expect(result.success).toBe(false);
    });

    it("rejects a non-URL base", () => {
      const result = ConfigFileSchema.safeParse({ portal: { baseUrl: "not a url" } });
      expect(result.success).toBe(false);
    });

    it("rejects unknown log levels", () => {
      const result = ConfigFileSchema.safeParse({ logging: { level: "verbose" } });
      expect(result.success).toBe(false);
    });
  });

  describe("loadConfigFile", () => {
    it("returns undefined if file does not exist", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      expect(loadConfigFile("/missing.yaml")).toBeUndefined();
    });

    it("parses valid YAML", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(
        "transfer:\n  concurrency: 3\ncrawl:\n  include:\n    - .gz\n"
      );

      expect(loadConfigFile("/config.yaml")).toEqual({
        transfer: { concurrency: 3 },
        crawl: { include: [".gz"] },
      });
    });

    it("returns an empty object for an empty file", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("");

      expect(loadConfigFile("/empty.yaml")).toEqual({});
    });

    it("throws CONFIG_INVALID listing schema issues", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("transfer:\n  concurrency: 0\n");

      try {
        loadConfigFile("/bad.yaml");
        expect.fail("expected loadConfigFile to throw");
      } catch (error) {
        expect(error).toBeInstanceOf(SyncError);
        expect(error).toMatchObject({
          code: "CONFIG_INVALID",
          message: "Configuration in /bad.yaml has errors",
          details: expect.stringMatching(/^transfer\.concurrency: /),
        });
      }
    });

    it("throws on malformed YAML", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("transfer: [unclosed");

      expect(() => loadConfigFile("/broken.yaml")).toThrow(SyncError);
    });
  });

  describe("requirePortalEndpoints", () => {
    it("derives OpenID Connect endpoints from the realm URL", () => {
      const endpoints = requirePortalEndpoints({
        baseUrl: "https://data.example.org/files/",
        realmUrl: "https://auth.example.org/realms/demo/protocol/openid-connect/",
        clientId: "portal-client",
        scope: "openid email",
      });

      expect(endpoints).toEqual({
        baseUrl: "https://data.example.org/files/",
        realmUrl: "https://auth.example.org/realms/demo/protocol/openid-connect",
        tokenUrl: "https://auth.example.org/realms/demo/protocol/openid-connect/token",
        authorizationUrl: "https://auth.example.org/realms/demo/protocol/openid-connect/auth",
        clientId: "portal-client",
        clientSecret: undefined,
        redirectUri: "https://data.example.org/oauth2callback",
        scope: "openid email",
      });
    });

    it("keeps explicit endpoint overrides", () => {
      const endpoints = requirePortalEndpoints({
        baseUrl: "https://data.example.org/",
        realmUrl: "https://auth.example.org/oidc",
        tokenUrl: "https://auth.example.org/custom/token",
        clientId: "portal-client",
        redirectUri: "https://data.example.org/callback",
        scope: "openid",
      });

      expect(endpoints.tokenUrl).toBe("https://auth.example.org/custom/token");
      expect(endpoints.authorizationUrl).toBe("https://auth.example.org/oidc/auth");
      expect(endpoints.redirectUri).toBe("https://data.example.org/callback");
    });

    it("fails when a required setting is missing", () => {
      expect(() =>
        requirePortalEndpoints({ baseUrl: "https://data.example.org/", scope: "openid" })
      ).toThrow("Missing portal.realmUrl");
    });
  });
});
