import { describe, test } from "node:test";
import * as assert from "node:assert";
import { FetchError, Response, type RequestInit } from "node-fetch";
import { Service, TransportError, createLogger } from "@stepwire/core";
import NodeFetchTransport, { type NodeFetch } from "../node-fetch-transport";

interface FetchCall {
  url: string;
  init?: RequestInit;
}

const logger = createLogger({ level: "silent" });

function createFetchMock(
  respond: (index: number) => Response | Error
): { fetch: NodeFetch; calls: FetchCall[] } {
  const calls: FetchCall[] = [];
  const fetchMock: NodeFetch = async (input, init) => {
    calls.push({ url: String(input), init });
    const outcome = respond(calls.length - 1);
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  };
  return { fetch: fetchMock, calls };
}

function createService(fetchMock: NodeFetch): Service {
  return new Service(new NodeFetchTransport({ fetch: fetchMock }), {}, logger)
    .withHost("https://api.example.com")
    .header("Accept", "application/json");
}

describe("NodeFetchTransport", () => {
  test("should send a GET request and expose the response", async () => {
    const mock = createFetchMock(
      () =>
        new Response('{"id":1}', {
          status: 200,
          statusText: "OK",
          headers: { "Content-Type": "application/json" },
        })
    );

    const result = await createService(mock.fetch).get("/users/1").execute();

    assert.ok(result.ok);
    assert.strictEqual(result.response.status, 200);
    assert.strictEqual(result.response.statusText, "OK");
    assert.strictEqual(result.response.headers.get("content-type"), "application/json");
    assert.deepStrictEqual(await result.response.json(), { id: 1 });
    assert.strictEqual(mock.calls[0].url, "https://api.example.com/users/1");
    assert.strictEqual(mock.calls[0].init?.method, "GET");
    assert.deepStrictEqual(mock.calls[0].init?.headers, [["accept", "application/json"]]);
  });

  test("should pass byte bodies as buffers", async () => {
    const mock = createFetchMock(() => new Response(null, { status: 204 }));

    await createService(mock.fetch)
      .request("PUT", "/blobs/1")
      .body(new Uint8Array([1, 2, 3]))
      .execute();

    const body = mock.calls[0].init?.body;
    assert.ok(Buffer.isBuffer(body));
    assert.deepStrictEqual([...body], [1, 2, 3]);
  });

  test("should retry fetch errors until a call succeeds", async () => {
    const mock = createFetchMock((index) =>
      index < 2
        ? new FetchError("request to https://api.example.com/flaky failed", "system")
        : new Response("ok")
    );

    const result = await createService(mock.fetch)
      .get("/flaky")
      .retryDelay(1, 1)
      .execute();

    assert.ok(result.ok);
    assert.strictEqual(await result.response.text(), "ok");
    assert.strictEqual(mock.calls.length, 3);
  });

  test("should report the last failure once retries run out", async () => {
    const mock = createFetchMock(
      () => new FetchError("request to https://api.example.com/down failed", "system")
    );

    const result = await createService(mock.fetch).get("/down").retryDelay(1).execute();

    assert.strictEqual(result.ok, false);
    assert.ok(result.error instanceof TransportError);
    assert.strictEqual(
      result.error.message,
      "GET https://api.example.com/down failed: request to https://api.example.com/down failed"
    );
    assert.strictEqual(result.error.attempts, 2);
  });
});
