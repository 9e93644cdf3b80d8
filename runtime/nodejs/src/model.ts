import type { ExecutionContext, Resource, ValueResolver } from "@apphost/sdk";
import { EnvironmentVariableEvaluator } from "./environment-evaluator.js";
import type { EventBus } from "./events.js";
import {
  ManifestSerializer,
  type ManifestDocument,
  type ManifestResource,
} from "./manifest-serializer.js";
import type { ResourceRegistry } from "./registry.js";
import type { ModelResource } from "./resources/index.js";
import { createValueResolver } from "./value-resolvers.js";

/**
 * The resource graph plus the services that read it. Shared by the builder
 * and the built application.
 */
export class ApplicationModel {
  constructor(
    readonly registry: ResourceRegistry,
    readonly executionContext: ExecutionContext,
    readonly events: EventBus,
  ) {}

  createValueResolver(): ValueResolver {
    return createValueResolver(this.executionContext, this.registry);
  }

  async getEnvironmentVariables(resource: Resource): Promise<Map<string, string>> {
    return new EnvironmentVariableEvaluator(this.createValueResolver()).evaluate(resource);
  }

  async getConnectionString(resource: Resource, endpointName?: string): Promise<string> {
    return this.createValueResolver().connectionString(resource, endpointName);
  }

  async getManifest(resource: ModelResource): Promise<ManifestResource> {
    return new ManifestSerializer(this.registry, this.executionContext).serialize(resource);
  }

  async getApplicationManifest(): Promise<ManifestDocument> {
    return new ManifestSerializer(this.registry, this.executionContext).serializeApplication(
      this.registry.getAll(),
    );
  }
}
