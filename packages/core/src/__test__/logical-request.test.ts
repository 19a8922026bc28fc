import { describe, test } from "node:test";
import * as assert from "node:assert";
import {
  ConfigurationError,
  LogicalRequest,
  MaterializationError,
  createLogger,
  Executor,
} from "../index";
import TestTransport from "./__mocks__/test-transport";

const executor = new Executor({ logger: createLogger({ level: "silent" }) });

function createRequest(uri = "https://api.example.com/search", method = "GET") {
  return new LogicalRequest({
    method,
    uri,
    transport: new TestTransport(),
    executor,
  });
}

describe("LogicalRequest", () => {
  describe("materialize", () => {
    test("should default an empty method to GET", () => {
      const wire = createRequest("https://api.example.com", "").materialize();

      assert.strictEqual(wire.method, "GET");
    });

    test("should append query parameters to the URI", () => {
      const wire = createRequest("https://api.example.com/search?lang=en")
        .params("q", "shoes", "q", "boots", "page", "2")
        .materialize();

      assert.strictEqual(
        wire.url.href,
        "https://api.example.com/search?lang=en&q=shoes&q=boots&page=2"
      );
    });

    test("should combine appended and replaced headers", () => {
      const wire = createRequest()
        .header("Accept", "application/json")
        .header("Accept", "text/plain")
        .rawHeader("X-Api-Key", "first")
        .rawHeader("X-Api-Key", "test-key")
        .materialize();

      assert.strictEqual(wire.headers.get("accept"), "application/json, text/plain");
      assert.strictEqual(wire.headers.get("x-api-key"), "test-key");
    });

    test("should encode object bodies as JSON", () => {
      const wire = createRequest("https://api.example.com/users", "POST")
        .body({ name: "Ada" })
        .materialize();

      assert.strictEqual(wire.body, '{"name":"Ada"}');
      assert.strictEqual(wire.headers.get("content-type"), "application/json");
    });

    test("should keep an explicit content type and pass strings through", () => {
      const wire = createRequest("https://api.example.com/users", "POST")
        .rawHeader("Content-Type", "text/csv")
        .body("id,name\n1,Ada")
        .materialize();

      assert.strictEqual(wire.body, "id,name\n1,Ada");
      assert.strictEqual(wire.headers.get("content-type"), "text/csv");
    });

    test("should carry the configured timeout", () => {
      assert.strictEqual(createRequest().materialize().timeoutMs, 20_000);
    });

    test("should build the wire request only once", () => {
      const request = createRequest();
      const first = request.materialize();
      request.header("X-Late", "ignored");

      assert.strictEqual(request.materialize(), first);
      assert.strictEqual(first.headers.get("x-late"), null);
    });

    test("should not cache a failed materialization", () => {
      const request = createRequest("/relative/path");

      assert.throws(() => request.materialize(), MaterializationError);
      assert.strictEqual(request.wireRequest, undefined);
    });
  });

  describe("builder validation", () => {
    test("should throw on an odd number of params", () => {
      assert.throws(() => createRequest().params("q"), {
        name: "ConfigurationError",
        message: "params must be key/value pairs",
      });
    });

    test("should throw on a negative retry delay", () => {
      assert.throws(() => createRequest().retryDelay(10, -1), ConfigurationError);
    });

    test("should replace the retry delays on every call", () => {
      const request = createRequest().retryDelay(1, 2, 3).retryDelay(4);

      assert.deepStrictEqual(request.retryDelays, [4]);
    });
  });

  test("execute() should go through its executor", async () => {
    const transport = new TestTransport().reply({ status: 204 });
    const request = new LogicalRequest({
      method: "DELETE",
      uri: "https://api.example.com/users/1",
      transport,
      executor,
    });

    const result = await request.execute();

    assert.strictEqual(result.response?.status, 204);
    assert.strictEqual(transport.calls[0].method, "DELETE");
  });
});
