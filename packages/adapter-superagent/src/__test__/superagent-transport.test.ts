import { after, before, describe, test } from "node:test";
import * as assert from "node:assert";
import { createServer, type IncomingHttpHeaders, type Server } from "node:http";
import { Service, TransportError, createLogger } from "@stepwire/core";
import SuperagentTransport from "../superagent-transport";

interface ReceivedRequest {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
  body: string;
}

const logger = createLogger({ level: "silent" });

describe("SuperagentTransport", () => {
  const received: ReceivedRequest[] = [];
  let server: Server;
  let host = "";

  before(async () => {
    server = createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on("data", (chunk: Buffer) => chunks.push(chunk));
      req.on("end", () => {
        received.push({
          method: req.method,
          url: req.url,
          headers: req.headers,
          body: Buffer.concat(chunks).toString("utf8"),
        });

        switch (req.url) {
          case "/users/1":
            res.writeHead(200, { "Content-Type": "application/json" });
            res.end('{"id":1}');
            break;
          case "/slow":
            // never answered; the client times out
            break;
          default:
            res.writeHead(404, { "Content-Type": "text/plain" });
            res.end("missing");
        }
      });
    });

    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("server has no TCP address");
    }
    host = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
  });

  function createService(timeoutMs = 2000): Service {
    return new Service(
      new SuperagentTransport(),
      { timeoutMs, urlValidation: { allowLocalhost: true } },
      logger
    )
      .withHost(host)
      .header("Accept", "application/json");
  }

  test("should send a GET request and expose the response", async () => {
    received.length = 0;

    const result = await createService().get("/users/1").execute();

    assert.ok(result.ok);
    assert.strictEqual(result.response.status, 200);
    assert.strictEqual(result.response.statusText, "OK");
    assert.strictEqual(result.response.headers.get("content-type"), "application/json");
    assert.deepStrictEqual(await result.response.json(), { id: 1 });
    assert.strictEqual(received[0].method, "GET");
    assert.strictEqual(received[0].headers.accept, "application/json");
  });

  test("should send the encoded body", async () => {
    received.length = 0;

    const result = await createService().post("/users").body({ name: "Ada" }).execute();

    assert.strictEqual(result.response?.status, 404);
    assert.strictEqual(received[0].method, "POST");
    assert.strictEqual(received[0].body, '{"name":"Ada"}');
    assert.strictEqual(received[0].headers["content-type"], "application/json");
  });

  test("should treat error statuses as responses", async () => {
    const result = await createService().get("/nope").retryDelay(1).execute();

    assert.ok(result.ok);
    assert.strictEqual(result.response.status, 404);
    assert.strictEqual(result.response.statusText, "Not Found");
    assert.strictEqual(await result.response.text(), "missing");
  });

  test("should fail with a transport error when the timeout elapses", async () => {
    const result = await createService(50).get("/slow").execute();

    assert.strictEqual(result.ok, false);
    assert.ok(result.error instanceof TransportError);
    assert.match(result.error.message, /^GET http:\/\/127\.0\.0\.1:\d+\/slow failed: Timeout of 50ms exceeded$/);
  });
});
