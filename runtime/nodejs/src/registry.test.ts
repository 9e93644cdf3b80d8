import { ResourceRegistry, validateResourceName } from "./registry.js";
import { ContainerResource, ProjectResource } from "./resources/index.js";

describe("ResourceRegistry", () => {
  it("should keep registration order", () => {
    const registry = new ResourceRegistry();
    registry.register(new ContainerResource("cache"));
    registry.register(new ProjectResource("api", "./src/Api"));
    registry.register(new ContainerResource("db"));

    expect(registry.getAll().map((resource) => resource.name)).toEqual(["cache", "api", "db"]);
    expect(registry.getByKind("container").map((resource) => resource.name)).toEqual(["cache", "db"]);
  });

  it("should find resources regardless of case", () => {
    const registry = new ResourceRegistry();
    const cache = new ContainerResource("Cache");
    registry.register(cache);

    expect(registry.get("cache")).toBe(cache);
    expect(registry.get("db")).toBeUndefined();
  });

  it("should name the existing resource on a duplicate", () => {
    const registry = new ResourceRegistry();
    registry.register(new ContainerResource("cache"));

    expect(() => registry.register(new ContainerResource("CACHE"))).toThrow(
      'Cannot add resource of kind container with name "CACHE": a container named "cache" already exists',
    );
  });

  it("should refuse changes once frozen", () => {
    const registry = new ResourceRegistry();
    registry.freeze();

    expect(registry.isFrozen).toBe(true);
    expect(() => registry.register(new ContainerResource("cache"))).toThrow(
      expect.objectContaining({ code: "ERR_MODEL_FROZEN" }),
    );
  });

  describe("validateResourceName", () => {
    it.each(["a", "cache", "Cache-01", "my-cache-2", "a".repeat(64)])("should accept %j", (name) => {
      expect(() => validateResourceName(name)).not.toThrow();
    });
  });
});
