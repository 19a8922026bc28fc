import { ConfigurationError } from "./errors";
import type Service from "./service";

/**
 * Storage behind a Registry. Pick the implementation at construction time
 * to match how the registry will be shared.
 */
export interface ServiceStore {
  store(name: string, service: Service): void;
  load(name: string): Service | undefined;
  remove(name: string): void;
}

export class MapServiceStore implements ServiceStore {
  private readonly services = new Map<string, Service>();

  public store(name: string, service: Service): void {
    this.services.set(name, service);
  }

  public load(name: string): Service | undefined {
    return this.services.get(name);
  }

  public remove(name: string): void {
    this.services.delete(name);
  }
}

/**
 * Named Services, passed explicitly to the code that needs them.
 *
 * @example
 * ```typescript
 * const registry = new Registry().register("users", usersApi);
 * const result = await registry.require("users").get("/users").execute();
 * ```
 */
export default class Registry {
  constructor(private readonly store: ServiceStore = new MapServiceStore()) {}

  public register(name: string, service: Service): this {
    this.store.store(name, service);
    return this;
  }

  public get(name: string): Service | undefined {
    return this.store.load(name);
  }

  public has(name: string): boolean {
    return this.store.load(name) !== undefined;
  }

  /**
   * @throws {ConfigurationError} If no service is registered under `name`
   */
  public require(name: string): Service {
    const service = this.store.load(name);
    if (!service) {
      throw new ConfigurationError(`Service "${name}" is not registered`);
    }
    return service;
  }

  public remove(name: string): this {
    this.store.remove(name);
    return this;
  }
}
