import { test, type TestContext } from "node:test";
import assert from "node:assert/strict";
import { once } from "node:events";
import { LATEST_PROTOCOL_VERSION } from "@modelcontextprotocol/sdk/types.js";
import { createHttpApp } from "../src/httpApp.js";
import { createTestRuntime } from "./helpers/runtime.js";

const MCP_HEADERS = {
  "content-type": "application/json",
  accept: "application/json, text/event-stream"
};

async function startApp(t: TestContext) {
  const runtime = await createTestRuntime();
  const http = createHttpApp(runtime);
  const listener = http.app.listen(0, "127.0.0.1");
  await once(listener, "listening");
  const address = listener.address();
  assert.ok(address && typeof address === "object");

  t.after(async () => {
    runtime.toolset.dispose();
    await http.closeAll();
    listener.closeAllConnections();
    listener.close();
  });

  return { runtime, http, url: `http://127.0.0.1:${address.port}/mcp` };
}

test("a request without a session that is not initialize leaves nothing behind", async t => {
  const { runtime, http, url } = await startApp(t);

  for (let attempt = 0; attempt < 3; attempt += 1) {
    const response = await fetch(url, {
      method: "POST",
      headers: MCP_HEADERS,
      body: JSON.stringify({ jsonrpc: "2.0", id: attempt + 1, method: "tools/list" })
    });
    await response.text();
    assert.equal(response.status, 400);
  }

  assert.equal(http.sessionCount, 0);
  assert.equal(runtime.notifier.sessionCount, 0);
});

test("initialize opens a session that DELETE closes", async t => {
  const { runtime, http, url } = await startApp(t);

  const initialized = await fetch(url, {
    method: "POST",
    headers: MCP_HEADERS,
    body: JSON.stringify({
      jsonrpc: "2.0",
      id: 1,
      method: "initialize",
      params: {
        protocolVersion: LATEST_PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: { name: "test-client", version: "0.0.0" }
      }
    })
  });
  await initialized.text();
  const sessionId = initialized.headers.get("mcp-session-id");

  assert.equal(initialized.status, 200);
  assert.ok(sessionId);
  assert.equal(http.sessionCount, 1);
  assert.equal(runtime.notifier.sessionCount, 1);

  const closed = await fetch(url, { method: "DELETE", headers: { "mcp-session-id": sessionId } });
  await closed.text();

  assert.equal(closed.status, 200);
  assert.equal(http.sessionCount, 0);
  assert.equal(runtime.notifier.sessionCount, 0);
});

test("unknown sessions are rejected with a JSON error", async t => {
  const { url } = await startApp(t);

  const response = await fetch(url, { method: "GET", headers: { "mcp-session-id": "missing" } });

  assert.equal(response.status, 404);
  assert.deepEqual(await response.json(), {
    error: "unknown_session",
    message: "Session not found. Start a new session to initialize."
  });
});
