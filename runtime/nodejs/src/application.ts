import * as fs from "fs/promises";
import * as path from "path";
import type { Resource } from "@apphost/sdk";
import {
  DistributedApplicationBuilder,
  type DistributedApplicationOptions,
} from "./builder.js";
import {
  EndpointAllocator,
  type EndpointAllocation,
  type EndpointAllocatorOptions,
} from "./endpoint-allocator.js";
import {
  stringifyManifest,
  type ManifestDocument,
  type ManifestResource,
} from "./manifest-serializer.js";
import type { ApplicationModel } from "./model.js";
import type {
  ContainerResource,
  ExecutableResource,
  ModelResource,
  ParameterResource,
  ProjectResource,
} from "./resources/index.js";

export const DEFAULT_MANIFEST_FILE = "manifest.json";

export interface RunResult {
  allocations: EndpointAllocation[];
  environment: Map<string, Map<string, string>>;
}

/**
 * A built, frozen application model.
 */
export class DistributedApplication {
  constructor(readonly model: ApplicationModel) {}

  static createBuilder(options: DistributedApplicationOptions = {}): DistributedApplicationBuilder {
    return new DistributedApplicationBuilder(options);
  }

  get executionContext() {
    return this.model.executionContext;
  }

  getResources(): ModelResource[] {
    return this.model.registry.getAll();
  }

  getResource(name: string): ModelResource {
    return this.model.registry.require(name);
  }

  getContainerResources(): ContainerResource[] {
    return this.getResources().filter(
      (resource): resource is ContainerResource => resource.kind === "container",
    );
  }

  getProjectResources(): ProjectResource[] {
    return this.getResources().filter(
      (resource): resource is ProjectResource => resource.kind === "project",
    );
  }

  getExecutableResources(): ExecutableResource[] {
    return this.getResources().filter(
      (resource): resource is ExecutableResource => resource.kind === "executable",
    );
  }

  getParameterResources(): ParameterResource[] {
    return this.getResources().filter(
      (resource): resource is ParameterResource => resource.kind === "parameter",
    );
  }

  /** Assigns run-mode addresses to every endpoint not yet allocated. */
  allocateEndpoints(options: EndpointAllocatorOptions = {}): EndpointAllocation[] {
    const allocations = new EndpointAllocator(options).allocateAll(this.getResources());
    for (const allocation of allocations) {
      this.model.events.emit("Endpoint.Allocated", { ...allocation });
    }
    return allocations;
  }

  async getEnvironmentVariables(resource: Resource | string): Promise<Map<string, string>> {
    return this.model.getEnvironmentVariables(this.lookup(resource));
  }

  async getConnectionString(resource: Resource | string, endpointName?: string): Promise<string> {
    return this.model.getConnectionString(this.lookup(resource), endpointName);
  }

  async getManifest(resource: ModelResource | string): Promise<ManifestResource> {
    return this.model.getManifest(
      typeof resource === "string" ? this.getResource(resource) : resource,
    );
  }

  async getApplicationManifest(): Promise<ManifestDocument> {
    return this.model.getApplicationManifest();
  }

  /**
   * Writes the manifest of the whole model. `outputPath` may name a file or a
   * directory; a directory receives `manifest.json`.
   */
  async publish(outputPath?: string): Promise<string> {
    const target = resolveManifestPath(outputPath ?? this.model.executionContext.outputPath);
    const manifest = stringifyManifest(await this.getApplicationManifest());
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, `${manifest}\n`, "utf-8");
    this.model.events.emit("Manifest.Written", {
      path: target,
      resources: this.getResources().length,
    });
    return target;
  }

  /**
   * Publish mode writes the manifest. Run mode places every endpoint and
   * evaluates the environment of each service resource.
   */
  async run(options: EndpointAllocatorOptions = {}): Promise<RunResult | string> {
    if (this.model.executionContext.isPublishMode) {
      return this.publish();
    }
    const allocations = this.allocateEndpoints(options);
    const environment = new Map<string, Map<string, string>>();
    for (const resource of this.getResources()) {
      if (resource.kind === "parameter") {
        continue;
      }
      environment.set(resource.name, await this.getEnvironmentVariables(resource));
    }
    return { allocations, environment };
  }

  private lookup(resource: Resource | string): Resource {
    return typeof resource === "string" ? this.getResource(resource) : resource;
  }
}

function resolveManifestPath(outputPath: string | undefined): string {
  if (outputPath === undefined) {
    return path.resolve(DEFAULT_MANIFEST_FILE);
  }
  return path.extname(outputPath) === ".json"
    ? path.resolve(outputPath)
    : path.resolve(outputPath, DEFAULT_MANIFEST_FILE);
}
