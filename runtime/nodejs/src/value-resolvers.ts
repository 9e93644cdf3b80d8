import {
  findConnectionString,
  findEndpoint,
  isParameter,
  type EndpointAnnotation,
  type EndpointProperty,
  type ExecutionContext,
  type ParameterLike,
  type Resource,
  type ValueResolver,
} from "@apphost/sdk";
import { formatUrl } from "./endpoint.js";
import { parseTemplate, renderTemplate, unresolved, type TemplateSegment } from "./expressions.js";
import type { ResourceRegistry } from "./registry.js";
import { AppHostError } from "./types.js";

type Placeholder = Extract<TemplateSegment, { kind: "placeholder" }>;

/**
 * Shared template and connection-string logic. Subclasses only decide how a
 * single endpoint property or parameter turns into text.
 */
abstract class BaseValueResolver implements ValueResolver {
  constructor(
    readonly executionContext: ExecutionContext,
    protected readonly registry: ResourceRegistry,
  ) {}

  abstract endpoint(resource: Resource, endpointName: string, property: EndpointProperty): string;

  abstract parameter(parameter: ParameterLike): Promise<string>;

  async connectionString(resource: Resource, endpointName?: string): Promise<string> {
    const annotation = findConnectionString(resource, endpointName);
    if (!annotation) {
      throw missingConnectionString(resource, endpointName);
    }
    return this.template(annotation.template, resource);
  }

  async template(template: string, owner: Resource): Promise<string> {
    const segments = parseTemplate(template, owner.name);
    return renderTemplate(segments, (placeholder) => this.resolvePlaceholder(placeholder, owner));
  }

  protected requireEndpoint(resource: Resource, endpointName: string): EndpointAnnotation {
    const endpoint = findEndpoint(resource, endpointName);
    if (!endpoint) {
      throw new AppHostError(
        "ERR_ENDPOINT_NOT_FOUND",
        `Resource "${resource.name}" has no endpoint named "${endpointName}"`,
        { resource: resource.name, field: endpointName },
      );
    }
    return endpoint;
  }

  private async resolvePlaceholder(placeholder: Placeholder, owner: Resource): Promise<string> {
    const { target, property } = placeholder;
    if (property === "value") {
      const parameter = this.registry.get(target);
      if (!parameter || !isParameter(parameter)) {
        throw unresolved(
          `Placeholder "{${placeholder.raw}}" of "${owner.name}" does not name a parameter`,
          owner.name,
        );
      }
      return this.parameter(parameter);
    }
    if (!findEndpoint(owner, target)) {
      throw unresolved(
        `Placeholder "{${placeholder.raw}}" of "${owner.name}" does not name one of its endpoints`,
        owner.name,
      );
    }
    return this.endpoint(owner, target, property);
  }
}

export class RunValueResolver extends BaseValueResolver {
  endpoint(resource: Resource, endpointName: string, property: EndpointProperty): string {
    const endpoint = this.requireEndpoint(resource, endpointName);
    if (property === "scheme") {
      return endpoint.uriScheme;
    }
    if (property === "targetPort" && endpoint.targetPort !== undefined) {
      return String(endpoint.targetPort);
    }

    const allocation = endpoint.allocatedEndpoint;
    if (!allocation) {
      throw new AppHostError(
        "ERR_MISSING_ALLOCATION",
        `Endpoint "${endpointName}" of resource "${resource.name}" has not been allocated`,
        { resource: resource.name, field: endpointName },
      );
    }
    switch (property) {
      case "host":
        return allocation.host;
      case "port":
      case "targetPort":
        return String(allocation.port);
      case "url":
        return formatUrl(endpoint.uriScheme, allocation);
    }
  }

  async parameter(parameter: ParameterLike): Promise<string> {
    return parameter.getValue();
  }
}

export class PublishValueResolver extends BaseValueResolver {
  endpoint(resource: Resource, endpointName: string, property: EndpointProperty): string {
    this.requireEndpoint(resource, endpointName);
    return `{${resource.name}.bindings.${endpointName}.${property}}`;
  }

  async parameter(parameter: ParameterLike): Promise<string> {
    return `{${parameter.name}.value}`;
  }

  /**
   * Default connection strings of other resources are referenced, not
   * inlined; the manifest carries the expression on the target itself.
   */
  async connectionString(resource: Resource, endpointName?: string): Promise<string> {
    if (endpointName === undefined) {
      if (!findConnectionString(resource)) {
        throw missingConnectionString(resource);
      }
      return `{${resource.name}.connectionString}`;
    }
    return super.connectionString(resource, endpointName);
  }
}

export function createValueResolver(
  executionContext: ExecutionContext,
  registry: ResourceRegistry,
): ValueResolver {
  return executionContext.isPublishMode
    ? new PublishValueResolver(executionContext, registry)
    : new RunValueResolver(executionContext, registry);
}

function missingConnectionString(resource: Resource, endpointName?: string): AppHostError {
  const what =
    endpointName === undefined ? "a connection string" : `a connection string for endpoint "${endpointName}"`;
  return new AppHostError(
    "ERR_MISSING_CONNECTION_STRING",
    `Resource "${resource.name}" does not provide ${what}`,
    { resource: resource.name, field: endpointName ?? "connectionString" },
  );
}
