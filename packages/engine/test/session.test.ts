import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { test } from "node:test";
import { NO_RESPONSE } from "../../shared/src/contracts";
import { HookNotFoundError, SessionClosedError, ValidationError } from "../src/errors";
import { Logger } from "../src/logger";
import { HookRegistry, csrfTokenExtractor } from "../src/session/hooks";
import { BufferedOutput } from "../src/session/output";
import { REPORT_SEPARATOR } from "../src/session/reporter";
import { SmokeSession, type SmokeSessionOptions } from "../src/session/session";
import { createTempDir, startTestServer, unusedPort } from "./helpers/test-server";

function quietSession(output: BufferedOutput, options: SmokeSessionOptions = {}): SmokeSession {
  return new SmokeSession({
    output,
    logger: new Logger("error", () => undefined),
    ...options
  });
}

test("2xx assertion passes and a different exact code fails", async () => {
  const server = await startTestServer((_req, res) => {
    res.writeHead(200, { "content-type": "text/plain" });
    res.end("healthy");
  });
  const output = new BufferedOutput();
  const session = quietSession(output);

  await session.get(`${server.baseUrl}/health`);
  session.assertCodeOk();
  session.assertCode(404);

  assert.deepEqual(output.lines, [
    `> GET ${server.baseUrl}/health`,
    "    [ OK ] Response code is 2xx (200)",
    "    [FAIL] Response code is 404 (got 200)"
  ]);
  assert.deepEqual(session.summary(), {
    ok_count: 1,
    fail_count: 1,
    total: 2,
    exit_code: 1,
    line: "FAILED (1 failed of 2)"
  });
  await server.close();
});

test("relative urls are requested under the url prefix", async () => {
  const server = await startTestServer((_req, res) => {
    res.writeHead(200);
    res.end("login form");
  });
  const output = new BufferedOutput();
  const session = quietSession(output);
  session.config.setUrlPrefix(server.baseUrl);

  const response = await session.get("/login");

  assert.equal(response.url, `${server.baseUrl}/login`);
  assert.equal(server.requests[0].url, "/login");
  assert.equal(output.lines[0], `> GET ${server.baseUrl}/login`);
  await server.close();
});

test("csrf token replaces the placeholder in the posted form body", async () => {
  const server = await startTestServer((_req, res) => {
    res.writeHead(200);
    res.end("posted");
  });
  const formPath = path.join(createTempDir("csrf"), "login.form");
  fs.writeFileSync(formPath, "csrf=__SMOKE_CSRF_TOKEN__&user=alice", "utf8");
  const session = quietSession(new BufferedOutput());
  session.config.setUrlPrefix(server.baseUrl);
  session.config.setCsrfToken("abc123");

  await session.post("/login", formPath);

  assert.equal(server.requests[0].method, "POST");
  assert.equal(server.requests[0].body, "csrf=abc123&user=alice");
  assert.equal(server.requests[0].headers["content-type"], "application/x-www-form-urlencoded");
  await server.close();
});

test("a refused connection is recorded as no response", async () => {
  const port = await unusedPort();
  const output = new BufferedOutput();
  const session = quietSession(output);
  const url = `http://127.0.0.1:${port}/`;

  const response = await session.get(url);
  session.assertNoResponse();
  session.assertBody("");
  session.assertHeader("Content-Type");
  session.assertCode(200);
  session.assertCodeOk();

  assert.deepEqual(response, { method: "GET", url, code: NO_RESPONSE, body: "", headers: [] });
  assert.deepEqual(output.lines.slice(1), [
    "    [ OK ] No response",
    "    [FAIL] Body contains \"\" (no response)",
    "    [FAIL] Headers contain \"Content-Type\" (no response)",
    "    [FAIL] Response code is 200 (got no response)",
    "    [FAIL] Response code is 2xx (got no response)"
  ]);
  assert.equal(session.summary().total, 5);
});

test("a server that never answers times out into no response", async () => {
  const server = await startTestServer(() => {
    // left unanswered
  });
  const session = quietSession(new BufferedOutput());
  session.config.setTimeout(200);

  const response = await session.get(`${server.baseUrl}/slow`);

  assert.equal(response.code, NO_RESPONSE);
  await server.close();
});

test("body assertions search the body for the pattern", async () => {
  const server = await startTestServer((req, res) => {
    res.writeHead(200);
    res.end(req.url === "/search" ? "<p>12 search results found</p>" : "no match here");
  });
  const output = new BufferedOutput();
  const session = quietSession(output);
  session.config.setUrlPrefix(server.baseUrl);

  await session.get("/search");
  const found = session.assertBody("search");
  await session.get("/other");
  const missing = session.assertBody("search");
  const regex = session.assertBody("^no .* here$");

  assert.equal(found.passed, true);
  assert.equal(missing.passed, false);
  assert.equal(regex.passed, true);
  await server.close();
});

test("header assertions match received header lines", async () => {
  const server = await startTestServer((_req, res) => {
    res.writeHead(200, { "x-smoke-token": "t-1" });
    res.end();
  });
  const session = quietSession(new BufferedOutput());

  const response = await session.get(server.baseUrl);

  assert.ok(response.headers.includes("x-smoke-token: t-1"));
  assert.equal(session.assertHeader("x-smoke-token: t-1").passed, true);
  assert.equal(session.assertHeader("x-smoke-token: t-2").passed, false);
  await server.close();
});

test("host override, origin and extra headers reach the server", async () => {
  const server = await startTestServer((_req, res) => {
    res.writeHead(204);
    res.end();
  });
  const session = quietSession(new BufferedOutput());
  session.config.setHost("shop.internal");
  session.config.setOrigin("https://app.example.test");
  session.config.setHeader("X-Env: staging");
  session.config.setHeader("x-env", "prod");

  await session.get(server.baseUrl);

  const headers = server.requests[0].headers;
  assert.equal(headers.host, "shop.internal");
  assert.equal(headers.origin, "https://app.example.test");
  assert.equal(headers["x-env"], "prod");
  await server.close();
});

test("redirects are followed unless disabled", async () => {
  const server = await startTestServer((req, res) => {
    if (req.url === "/old") {
      res.writeHead(302, { location: "/new" });
      res.end();
      return;
    }
    res.writeHead(200);
    res.end("new page");
  });
  const session = quietSession(new BufferedOutput());
  session.config.setUrlPrefix(server.baseUrl);

  const followed = await session.get("/old");
  session.config.followRedirects(false);
  const stopped = await session.get("/old");

  assert.equal(followed.code, 200);
  assert.equal(followed.body, "new page");
  assert.equal(stopped.code, 302);
  await server.close();
});

test("credentials without a password prompt once and send basic auth", async () => {
  const server = await startTestServer((_req, res) => {
    res.writeHead(200);
    res.end();
  });
  const prompts: string[] = [];
  const session = quietSession(new BufferedOutput(), {
    promptPassword: async (username) => {
      prompts.push(username);
      return "test-secret";
    }
  });
  session.config.setCredentials("alice");

  await session.get(server.baseUrl);
  await session.get(server.baseUrl);

  const expected = `Basic ${Buffer.from("alice:test-secret").toString("base64")}`;
  assert.deepEqual(prompts, ["alice"]);
  assert.equal(server.requests[0].headers.authorization, expected);
  assert.equal(server.requests[1].headers.authorization, expected);
  await server.close();
});

test("named after-response hook installs the csrf token for the next post", async () => {
  const server = await startTestServer((req, res) => {
    res.writeHead(200);
    res.end(req.url === "/form" ? "<input name=\"csrf\" value=\"tok-42\">" : "done");
  });
  const formPath = path.join(createTempDir("hook"), "submit.form");
  fs.writeFileSync(formPath, "token=__SMOKE_CSRF_TOKEN__", "utf8");
  const hooks = new HookRegistry().register(
    "csrf",
    csrfTokenExtractor("name=\"csrf\" value=\"([^\"]+)\"")
  );
  const session = quietSession(new BufferedOutput(), { hooks, afterResponse: "csrf" });
  session.config.setUrlPrefix(server.baseUrl);

  await session.get("/form");
  await session.post("/submit", formPath);

  assert.equal(session.config.snapshot().csrf_token, "tok-42");
  assert.equal(server.requests[1].body, "token=tok-42");
  await server.close();
});

test("the hook runs once per request after the last response is stored", async () => {
  const server = await startTestServer((_req, res) => {
    res.writeHead(200);
    res.end("ok");
  });
  const seen: boolean[] = [];
  const session: SmokeSession = quietSession(new BufferedOutput(), {
    afterResponse: (response, owner) => {
      seen.push(owner.lastResponse === response);
    }
  });

  await session.get(server.baseUrl);
  await session.get(server.baseUrl);

  assert.deepEqual(seen, [true, true]);
  await server.close();
});

test("an unregistered hook name fails the request after storing the response", async () => {
  const server = await startTestServer((_req, res) => {
    res.writeHead(200);
    res.end("ok");
  });
  const session = quietSession(new BufferedOutput(), { afterResponse: "missing" });

  await assert.rejects(session.get(server.baseUrl), HookNotFoundError);
  assert.equal(session.lastResponse?.code, 200);
  await server.close();
});

test("cors and preflight requests require an origin", async () => {
  const server = await startTestServer((_req, res) => {
    res.writeHead(204, { "access-control-allow-origin": "https://app.example.test" });
    res.end();
  });
  const session = quietSession(new BufferedOutput());

  await assert.rejects(session.cors(server.baseUrl), ValidationError);
  session.config.setOrigin("https://app.example.test");
  await session.cors(server.baseUrl);
  await session.preflight(server.baseUrl, "POST");

  assert.equal(server.requests.length, 2);
  assert.equal(server.requests[0].method, "GET");
  assert.equal(server.requests[0].headers.origin, "https://app.example.test");
  assert.equal(server.requests[1].method, "OPTIONS");
  assert.equal(server.requests[1].headers["access-control-request-method"], "POST");
  assert.equal(
    session.assertHeader("access-control-allow-origin: https://app.example.test").passed,
    true
  );
  await server.close();
});

test("requests go through the configured proxy", async () => {
  const proxy = await startTestServer((_req, res) => {
    res.writeHead(200);
    res.end("via proxy");
  });
  const session = quietSession(new BufferedOutput());
  session.config.setProxy(`127.0.0.1:${proxy.port}`);

  const response = await session.get("http://app.example.test/health");

  assert.equal(proxy.requests[0].url, "http://app.example.test/health");
  assert.equal(response.body, "via proxy");
  await proxy.close();
});

test("debug mode echoes the exchange to the diagnostic channel", async () => {
  const server = await startTestServer((_req, res) => {
    res.writeHead(200);
    res.end("healthy");
  });
  const output = new BufferedOutput();
  const session = quietSession(output);
  session.config.setDebug(true);

  await session.get(`${server.baseUrl}/health`);

  assert.equal(output.diagnostics[0], `> GET ${server.baseUrl}/health`);
  assert.ok(output.diagnostics.includes("< 200"));
  assert.equal(output.diagnostics[output.diagnostics.length - 1], "healthy");
  await server.close();
});

test("reporting zero checks passes and closes the session", async () => {
  const output = new BufferedOutput();
  const session = quietSession(output);

  assert.equal(session.report(), 0);
  assert.deepEqual(output.lines, [REPORT_SEPARATOR, "OK (0/0)"]);
  assert.throws(() => session.assertBody("x"), SessionClosedError);
  await assert.rejects(session.get("http://127.0.0.1:9/"), SessionClosedError);
});

test("reporting after a failed check exits nonzero", () => {
  const output = new BufferedOutput();
  const session = quietSession(output);
  session.assertCodeOk();

  assert.equal(session.report(), 1);
  assert.deepEqual(output.lines, [
    "    [FAIL] Response code is 2xx (no request made)",
    REPORT_SEPARATOR,
    "FAILED (1 failed of 1)"
  ]);
});
