import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  ConfigError,
  configSchema,
  loadConfig,
  parseConfig,
  resolveComposeFile,
  splitTokens,
} from "@stackctl/config";

describe("configSchema defaults", () => {
  it("should default MODE to development", () => {
    expect(configSchema.parse({}).MODE).toBe("development");
  });

  it("should default SERVICE to backend", () => {
    expect(configSchema.parse({}).SERVICE).toBe("backend");
  });

  it("should default ARGS to no tokens", () => {
    expect(configSchema.parse({}).ARGS).toEqual([]);
  });

  it("should default COMPOSE_COMMAND to docker compose", () => {
    expect(configSchema.parse({}).COMPOSE_COMMAND).toEqual(["docker", "compose"]);
  });

  it("should leave database credentials unset", () => {
    const config = configSchema.parse({});
    expect(config.DB_USERNAME).toBeUndefined();
    expect(config.DB_PASSWORD).toBeUndefined();
  });

  it("should default health URLs to the local gateway", () => {
    const config = configSchema.parse({});
    expect(config.GATEWAY_HEALTH_URL).toBe("http://localhost:5921/health");
    expect(config.BACKEND_HEALTH_URL).toBe("http://localhost:5921/api/health");
  });
});

describe("MODE", () => {
  it.each([
    ["development", "development"],
    ["dev", "development"],
    ["production", "production"],
    ["prod", "production"],
    ["PROD", "production"],
  ])("should read %s as %s", (input, expected) => {
    expect(parseConfig({ MODE: input }).MODE).toBe(expected);
  });

  it("should treat a blank MODE as unset", () => {
    expect(parseConfig({ MODE: "" }).MODE).toBe("development");
  });

  it("should reject staging instead of falling back to development", () => {
    expect(() => parseConfig({ MODE: "staging" })).toThrow(ConfigError);

    try {
      parseConfig({ MODE: "staging" });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toEqual([
          'MODE: Unknown mode "staging" (expected one of: development, production)',
        ]);
      }
    }
  });
});

describe("compose files", () => {
  it("should map each mode to its own file", () => {
    const config = parseConfig({});
    expect(resolveComposeFile("development", config)).toBe("docker/compose.development.yaml");
    expect(resolveComposeFile("production", config)).toBe("docker/compose.production.yaml");
  });

  it("should honor overridden paths", () => {
    const config = parseConfig({ COMPOSE_FILE_PRODUCTION: "deploy/prod.yml" });
    expect(resolveComposeFile("production", config)).toBe("deploy/prod.yml");
  });

  it("should reject the same file for both modes", () => {
    expect(() =>
      parseConfig({
        COMPOSE_FILE_DEVELOPMENT: "compose.yaml",
        COMPOSE_FILE_PRODUCTION: "compose.yaml",
      })
    ).toThrow("COMPOSE_FILE_PRODUCTION: development and production must use different compose files");
  });
});

describe("token splitting", () => {
  it("should split ARGS on any whitespace", () => {
    expect(parseConfig({ ARGS: "  --build \t -d " }).ARGS).toEqual(["--build", "-d"]);
  });

  it("should accept a single-binary compose command", () => {
    expect(parseConfig({ COMPOSE_COMMAND: "docker-compose" }).COMPOSE_COMMAND).toEqual(["docker-compose"]);
  });

  it("should reject a blank compose command", () => {
    expect(() => parseConfig({ COMPOSE_COMMAND: "   " })).toThrow("COMPOSE_COMMAND must not be blank");
  });

  it("should drop empty tokens", () => {
    expect(splitTokens("")).toEqual([]);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "stackctl-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should layer env file, environment and overrides", async () => {
    const envFile = path.join(dir, ".env");
    await writeFile(envFile, "MODE=production\nSERVICE=gateway\nDB_PASSWORD=from-file\n");

    const config = loadConfig(
      { ENV_FILE: envFile, SERVICE: "worker" },
      { SERVICE: "api", MODE: undefined }
    );

    expect(config.MODE).toBe("production");
    expect(config.SERVICE).toBe("api");
    expect(config.DB_PASSWORD).toBe("from-file");
    expect(config.ENV_FILE).toBe(envFile);
  });

  it("should take ENV_FILE from the environment, not from the file itself", async () => {
    const envFile = path.join(dir, ".env");
    await writeFile(envFile, `ENV_FILE=${path.join(dir, "other.env")}\nSERVICE=gateway\n`);

    const config = loadConfig({ ENV_FILE: envFile });

    expect(config.ENV_FILE).toBe(envFile);
    expect(config.SERVICE).toBe("gateway");
  });

  it("should not validate variables it does not use", () => {
    const config = loadConfig({ ENV_FILE: path.join(dir, "missing.env"), NODE_ENV: "staging" });
    expect(config.MODE).toBe("development");
  });

  it("should work without an env file", () => {
    const config = loadConfig({ ENV_FILE: path.join(dir, "missing.env") });
    expect(config.MODE).toBe("development");
  });
});
