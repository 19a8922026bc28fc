import { describe, test } from "node:test";
import * as assert from "node:assert";
import { MapServiceStore, Registry, Service, createLogger } from "../index";
import type { ServiceStore } from "../index";
import TestTransport from "./__mocks__/test-transport";

const logger = createLogger({ level: "silent" });

describe("Registry", () => {
  test("should store and look up services by name", () => {
    const users = new Service(new TestTransport(), {}, logger);
    const registry = new Registry().register("users", users);

    assert.strictEqual(registry.get("users"), users);
    assert.strictEqual(registry.require("users"), users);
    assert.strictEqual(registry.has("users"), true);
    assert.strictEqual(registry.get("orders"), undefined);
  });

  test("should throw when a required service is missing", () => {
    assert.throws(() => new Registry().require("orders"), {
      name: "ConfigurationError",
      message: 'Service "orders" is not registered',
    });
  });

  test("should remove services", () => {
    const registry = new Registry(new MapServiceStore()).register(
      "users",
      new Service(new TestTransport(), {}, logger)
    );

    registry.remove("users");

    assert.strictEqual(registry.has("users"), false);
  });

  test("should delegate to the store it was built with", () => {
    const operations: string[] = [];
    const backing = new MapServiceStore();
    const store: ServiceStore = {
      store: (name, service) => {
        operations.push(`store:${name}`);
        backing.store(name, service);
      },
      load: (name) => {
        operations.push(`load:${name}`);
        return backing.load(name);
      },
      remove: (name) => {
        operations.push(`remove:${name}`);
        backing.remove(name);
      },
    };
    const registry = new Registry(store);

    registry.register("users", new Service(new TestTransport(), {}, logger));
    registry.get("users");
    registry.remove("users");

    assert.deepStrictEqual(operations, ["store:users", "load:users", "remove:users"]);
  });
});
