import { test } from "node:test";
import assert from "node:assert/strict";
import { fileURLToPath } from "node:url";
import { isDirectExecution, main, runCli } from "./app.ts";
import { appConfig, loadAppConfig } from "./config.ts";

function withDiscordToken(value: string, run: () => Promise<void>) {
  const prior = appConfig.discordToken;
  appConfig.discordToken = value;
  return Promise.resolve()
    .then(run)
    .finally(() => {
      appConfig.discordToken = prior;
    });
}

test("isDirectExecution only returns true for the current module path", () => {
  const appPath = fileURLToPath(new URL("./app.ts", import.meta.url));
  assert.equal(isDirectExecution(["node", appPath]), true);
  assert.equal(isDirectExecution(["node", "/tmp/other-entry.ts"]), false);
  assert.equal(isDirectExecution(["node"]), false);
});

test("main throws immediately when DISCORD_TOKEN is missing", async () => {
  await assert.rejects(() => main(loadAppConfig({ OPENAI_API_KEY: "test-secret" })), /Missing DISCORD_TOKEN/);
});

test("main requires an OpenAI key for speech", async () => {
  await assert.rejects(() => main(loadAppConfig({ DISCORD_TOKEN: "test-token" })), /Missing OPENAI_API_KEY/);
});

test("runCli converts startup failures into exit code 1", async (t) => {
  let exitCode: number | null = null;
  const errors: string[] = [];

  t.mock.method(process, "exit", (code?: number) => {
    exitCode = Number(code);
    throw new Error("__process_exit__");
  });
  t.mock.method(console, "error", (...args: unknown[]) => {
    errors.push(args.map((arg) => String(arg)).join(" "));
  });

  await withDiscordToken("", async () => {
    await assert.rejects(() => runCli(), /__process_exit__/);
  });

  assert.equal(exitCode, 1);
  assert.equal(errors.length > 0, true);
  assert.match(errors[0] || "", /Fatal startup error:/);
});
