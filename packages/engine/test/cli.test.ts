import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { test } from "node:test";
import { EXIT_USAGE, main } from "../src/cli/main";
import { BufferedOutput } from "../src/session/output";
import { REPORT_SEPARATOR } from "../src/session/reporter";
import { createTempDir, startTestServer } from "./helpers/test-server";

test("run executes a plan file and history lists the recorded session", async () => {
  const server = await startTestServer((_req, res) => {
    res.writeHead(200);
    res.end("status: green");
  });
  const dir = createTempDir("cli");
  const planPath = path.join(dir, "status.json");
  const dbPath = path.join(dir, "history.db");
  fs.writeFileSync(
    planPath,
    JSON.stringify({
      name: "status-page",
      config: { url_prefix: server.baseUrl },
      steps: [{ type: "request", url: "/status", ok: true, assert: { body: ["green"] } }]
    }),
    "utf8"
  );

  const runOutput = new BufferedOutput();
  const exitCode = await main(["run", planPath, "--db", dbPath], { output: runOutput, env: {} });

  assert.equal(exitCode, 0);
  assert.deepEqual(runOutput.lines, [
    `> GET ${server.baseUrl}/status`,
    "    [ OK ] Response code is 2xx (200)",
    "    [ OK ] Body contains \"green\"",
    REPORT_SEPARATOR,
    "OK (2/2)"
  ]);

  const historyOutput = new BufferedOutput();
  const historyCode = await main(["history", "--db", dbPath], { output: historyOutput, env: {} });

  assert.equal(historyCode, 0);
  assert.equal(historyOutput.lines.length, 3);
  assert.ok(historyOutput.lines[2].includes("status-page"));
  assert.ok(historyOutput.lines[2].endsWith("passed    2/2"));
  await server.close();
});

test("an invalid plan is rejected with the validation errors", async () => {
  const dir = createTempDir("cli-invalid");
  const planPath = path.join(dir, "broken.json");
  fs.writeFileSync(planPath, JSON.stringify({ steps: [{ type: "request" }] }), "utf8");
  const output = new BufferedOutput();

  const exitCode = await main(["run", planPath], { output, env: {} });

  assert.equal(exitCode, EXIT_USAGE);
  assert.equal(output.diagnostics[0], `Invalid plan ${planPath}:`);
  assert.ok(output.diagnostics.length > 1);
  assert.deepEqual(output.lines, []);
});

test("a cors step without an origin is rejected before any request runs", async () => {
  const dir = createTempDir("cli-cors");
  const planPath = path.join(dir, "cors.json");
  const dbPath = path.join(dir, "history.db");
  fs.writeFileSync(
    planPath,
    JSON.stringify({
      steps: [
        { type: "request", url: "http://127.0.0.1:9/a", ok: true },
        { type: "request", url: "http://127.0.0.1:9/b", cors: true }
      ]
    }),
    "utf8"
  );
  const output = new BufferedOutput();

  const exitCode = await main(["run", planPath, "--db", dbPath], { output, env: {} });

  assert.equal(exitCode, EXIT_USAGE);
  assert.deepEqual(output.diagnostics, [
    `Invalid plan ${planPath}:`,
    "  /steps/1 cors requires an origin set by an earlier config"
  ]);
  assert.deepEqual(output.lines, []);
  assert.equal(fs.existsSync(dbPath), false);
});

test("unknown commands print usage", async () => {
  const output = new BufferedOutput();

  assert.equal(await main(["launch"], { output, env: {} }), EXIT_USAGE);
  assert.equal(output.diagnostics[0], "Usage:");
});
