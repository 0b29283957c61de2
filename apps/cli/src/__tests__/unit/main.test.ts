import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EXIT_USAGE } from "../../errors.js";
import { main } from "../../index.js";
import { RecordingRunner, TEST_CREDENTIALS, testDeps } from "../../testing/recording-runner.js";

describe("main", () => {
  let dir: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "stackctl-main-"));
    env = { ...TEST_CREDENTIALS, ENV_FILE: path.join(dir, ".env") };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should print help when no command is given", async () => {
    const deps = testDeps();

    await expect(main([], env, deps)).resolves.toBe(0);
    expect(deps.output.join("")).toContain("Available commands:");
    expect(deps.runner.invocations).toEqual([]);
  });

  it("should print help even with an invalid MODE in the environment", async () => {
    const deps = testDeps();

    await expect(main(["help"], { ...env, MODE: "staging" }, deps)).resolves.toBe(0);
    expect(deps.runner.invocations).toEqual([]);
  });

  it("should reject an unknown mode before running anything", async () => {
    const deps = testDeps();

    await expect(main(["up", "--mode", "staging"], env, deps)).resolves.toBe(EXIT_USAGE);
    expect(deps.runner.invocations).toEqual([]);
  });

  it("should reject unknown commands", async () => {
    const deps = testDeps();

    await expect(main(["deploy"], env, deps)).resolves.toBe(EXIT_USAGE);
    expect(deps.runner.invocations).toEqual([]);
  });

  it("should exit non-zero for db-restore without a file and spawn nothing", async () => {
    const deps = testDeps();

    await expect(main(["db-restore"], env, deps)).resolves.toBe(EXIT_USAGE);
    expect(deps.runner.invocations).toEqual([]);
  });

  it("should let flags override the environment and forward the rest", async () => {
    const deps = testDeps();

    const code = await main(
      ["up", "--mode", "prod", "--args", "--build", "-d", "backend"],
      { ...env, MODE: "dev", ARGS: "--no-build" },
      deps
    );

    expect(code).toBe(0);
    expect(deps.runner.invocations).toEqual([
      {
        command: "docker",
        args: [
          "compose",
          "-f",
          "docker/compose.production.yaml",
          "--env-file",
          env.ENV_FILE,
          "up",
          "--build",
          "-d",
          "backend",
        ],
      },
    ]);
  });

  it("should read inputs from the env file", async () => {
    await writeFile(path.join(dir, ".env"), "MODE=production\nSERVICE=gateway\n");
    const deps = testDeps();

    await main(["shell"], env, deps);

    expect(deps.runner.invocations[0]?.args.slice(2)).toEqual([
      "docker/compose.production.yaml",
      "--env-file",
      env.ENV_FILE,
      "exec",
      "gateway",
      "sh",
    ]);
  });

  it("should ignore an unrelated NODE_ENV in the environment", async () => {
    const deps = testDeps();

    await expect(main(["ps"], { ...env, NODE_ENV: "staging" }, deps)).resolves.toBe(0);
    expect(deps.runner.invocations).toHaveLength(1);
  });

  it("should ignore app settings in the shared env file", async () => {
    await writeFile(path.join(dir, ".env"), "NODE_ENV=local\nLOG_LEVEL=verbose\n");
    const deps = testDeps();

    await expect(main(["ps"], env, deps)).resolves.toBe(0);
    expect(deps.runner.invocations).toHaveLength(1);
  });

  it("should pass the tool's exit code through", async () => {
    const deps = testDeps({ runner: new RecordingRunner([130]) });

    await expect(main(["logs"], env, deps)).resolves.toBe(130);
  });

  it("should report runner failures as exit code 1", async () => {
    class MissingBinaryRunner extends RecordingRunner {
      override async run(): Promise<number> {
        throw new Error("spawn docker ENOENT");
      }
    }
    const deps = testDeps({ runner: new MissingBinaryRunner() });

    await expect(main(["ps"], env, deps)).resolves.toBe(1);
  });
});
