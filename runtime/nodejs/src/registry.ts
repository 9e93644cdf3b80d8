import type { ResourceKind } from "@apphost/sdk";
import type { ModelResource } from "./resources/index.js";
import { AppHostError } from "./types.js";

const NAME_REGEX = /^[A-Za-z](?:[A-Za-z0-9]|-(?!-))*$/;
const MAX_NAME_LENGTH = 64;

export function validateResourceName(name: string): void {
  if (name.length === 0 || name.length > MAX_NAME_LENGTH || !NAME_REGEX.test(name) || name.endsWith("-")) {
    throw new AppHostError(
      "ERR_INVALID_NAME",
      `Invalid resource name "${name}". Names start with a letter, contain only ASCII letters, ` +
        `digits and single hyphens, do not end with a hyphen and are at most ${MAX_NAME_LENGTH} characters long.`,
      { resource: name },
    );
  }
}

/**
 * Registry: indexes the resources of one application model by name, in
 * registration order. Names compare case-insensitively.
 */
export class ResourceRegistry {
  private resources: Map<string, ModelResource> = new Map();
  private frozen = false;

  register(resource: ModelResource): void {
    this.assertMutable();
    validateResourceName(resource.name);
    const key = resource.name.toLowerCase();
    const existing = this.resources.get(key);
    if (existing) {
      throw new AppHostError(
        "ERR_DUPLICATE_RESOURCE",
        `Cannot add resource of kind ${resource.kind} with name "${resource.name}": ` +
          `a ${existing.kind} named "${existing.name}" already exists`,
        { resource: resource.name },
      );
    }
    this.resources.set(key, resource);
  }

  get(name: string): ModelResource | undefined {
    return this.resources.get(name.toLowerCase());
  }

  require(name: string): ModelResource {
    const resource = this.get(name);
    if (!resource) {
      throw new AppHostError("ERR_RESOURCE_NOT_FOUND", `Resource "${name}" not found`, {
        resource: name,
      });
    }
    return resource;
  }

  getByKind(kind: ResourceKind): ModelResource[] {
    return this.getAll().filter((resource) => resource.kind === kind);
  }

  getAll(): ModelResource[] {
    return Array.from(this.resources.values());
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  freeze(): void {
    this.frozen = true;
  }

  assertMutable(resource?: string): void {
    if (this.frozen) {
      throw new AppHostError(
        "ERR_MODEL_FROZEN",
        "The application model is already built and can no longer be changed",
        { resource },
      );
    }
  }
}
