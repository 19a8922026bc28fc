import { describe, test } from "node:test";
import * as assert from "node:assert";
import { ConfigurationError, Service, createLogger } from "../index";
import TestTransport from "./__mocks__/test-transport";

const logger = createLogger({ level: "silent" });

function createService(transport = new TestTransport()): Service {
  return new Service(transport, { timeoutMs: 1500 }, logger).withHost(
    "https://api.example.com"
  );
}

describe("Service", () => {
  test("should resolve registered paths against the host", () => {
    const request = createService()
      .paths("listUsers", "/users", "getUser", "/users/1")
      .method("GET", "getUser");

    assert.strictEqual(request.uri, "https://api.example.com/users/1");
    assert.strictEqual(request.method, "GET");
  });

  test("should throw on odd path pairs", () => {
    assert.throws(() => createService().paths("listUsers"), {
      name: "ConfigurationError",
      message: "paths must be key/path pairs",
    });
  });

  test("should throw on an unknown path key", () => {
    assert.throws(() => createService().method("GET", "missing"), {
      name: "ConfigurationError",
      message: 'Path "missing" is not registered',
    });
  });

  test("should build REST URIs from segments", () => {
    const request = createService().rest("PUT", "", "users", "42", "roles");

    assert.strictEqual(request.uri, "https://api.example.com/users/42/roles");
    assert.strictEqual(request.method, "PUT");
  });

  test("should expose shortcut builders", () => {
    const service = createService();

    assert.strictEqual(service.get("/a").method, "GET");
    assert.strictEqual(service.post("/a").method, "POST");
  });

  test("should copy default headers into each request", () => {
    const service = createService().header("Accept", "application/json");
    const first = service.get("/a").rawHeader("Accept", "text/html");
    const second = service.get("/b");

    assert.strictEqual(first.materialize().headers.get("accept"), "text/html");
    assert.strictEqual(
      second.materialize().headers.get("accept"),
      "application/json"
    );
  });

  test("should apply the service timeout", () => {
    assert.strictEqual(createService().get("/a").materialize().timeoutMs, 1500);
  });

  test("should apply shared hooks, including ones added after the request was built", async () => {
    const transport = new TestTransport();
    const service = createService(transport);
    const request = service.get("/users");
    service.beforeSend((wire) => wire.headers.set("Authorization", "Bearer test-token"));

    await request.execute();

    assert.strictEqual(
      transport.calls[0].headers["authorization"],
      "Bearer test-token"
    );
  });

  test("should reject an invalid configuration", () => {
    assert.throws(
      () => new Service(new TestTransport(), { timeoutMs: -5 }, logger),
      (error: unknown) =>
        error instanceof ConfigurationError &&
        /^Invalid service configuration: timeoutMs:/.test(error.message)
    );
  });
});
