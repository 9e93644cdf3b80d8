import type { EnvironmentValue } from "@apphost/sdk";
import * as fs from "fs/promises";
import * as yaml from "js-yaml";
import * as path from "path";
import { DistributedApplication } from "./application.js";
import type {
  DistributedApplicationBuilder,
  DistributedApplicationOptions,
  ResourceBuilder,
} from "./builder.js";
import { ControllerRegistry, type ControllerContext } from "./controller-registry.js";
import { registerBuiltinControllers } from "./controllers/index.js";
import { ReferenceExpression } from "./expressions.js";
import {
  AppDefinitionSchema,
  ServiceEntrySchema,
  type AppDefinition,
  type EnvironmentValueEntry,
  type ReferenceEntry,
  type ResourceEntry,
  type ServiceEntry,
} from "./manifest-schemas.js";
import {
  isServiceResource,
  type ModelResource,
  type ParameterResource,
  type ServiceResource,
} from "./resources/index.js";
import { SchemaValidator } from "./schema-validator.js";
import { AppHostError } from "./types.js";

/**
 * Loader: reads a YAML app definition and declares its resources on a
 * builder.
 *
 * Resources are created first, ordered by kind (parameters before the rest,
 * otherwise file order). Environment, references and extra endpoints are
 * applied in a second pass, so entries may refer to resources declared
 * further down.
 */
export class Loader {
  readonly controllers: ControllerRegistry;
  private readonly validator: SchemaValidator;

  constructor(controllers?: ControllerRegistry, validator: SchemaValidator = new SchemaValidator()) {
    this.validator = validator;
    this.controllers = controllers ?? registerBuiltinControllers(new ControllerRegistry(validator));
  }

  async loadFile(filePath: string): Promise<AppDefinition> {
    const content = await fs.readFile(filePath, "utf-8");
    return this.parse(content, filePath);
  }

  parse(content: string, source = "<inline>"): AppDefinition {
    let document: unknown;
    try {
      document = yaml.load(content);
    } catch (error) {
      throw new AppHostError(
        "ERR_INVALID_DEFINITION",
        `Cannot parse app definition ${source}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    return this.validator.validate(AppDefinitionSchema, document, `app definition ${source}`);
  }

  /**
   * Loads `filePath` and returns a builder holding its resources. The
   * definition's `name` becomes the app name unless `options` sets one;
   * `setup` runs before any resource is added.
   */
  async createBuilder(
    filePath: string,
    options: DistributedApplicationOptions = {},
    setup?: (builder: DistributedApplicationBuilder) => void,
  ): Promise<DistributedApplicationBuilder> {
    const definition = await this.loadFile(filePath);
    const builder = DistributedApplication.createBuilder({
      ...options,
      appName: options.appName ?? definition.name,
    });
    setup?.(builder);
    this.apply(definition, builder, path.dirname(path.resolve(filePath)));
    return builder;
  }

  apply(
    definition: AppDefinition,
    builder: DistributedApplicationBuilder,
    baseDir = process.cwd(),
  ): Map<string, ResourceBuilder<ModelResource>> {
    const context: ControllerContext = { builder, baseDir };
    const created = new Map<string, ResourceBuilder<ModelResource>>();

    for (const parameter of definition.parameters ?? []) {
      created.set(
        parameter.name,
        builder.addParameter(parameter.name, {
          secret: parameter.secret,
          value: parameter.value,
          generate: parameter.generate,
        }),
      );
    }

    const entries = this.orderByKind(definition.resources);
    for (const entry of entries) {
      const resourceBuilder = this.controllers.create(entry, context);
      created.set(entry.name, resourceBuilder);
      if (isServiceBuilder(resourceBuilder)) {
        this.applyEndpoints(resourceBuilder, this.serviceFields(entry));
      }
    }

    for (const entry of entries) {
      const resourceBuilder = created.get(entry.name);
      if (resourceBuilder && isServiceBuilder(resourceBuilder)) {
        this.applyServiceFields(resourceBuilder, this.serviceFields(entry));
      }
    }
    return created;
  }

  private orderByKind(entries: readonly ResourceEntry[]): ResourceEntry[] {
    return entries
      .map((entry, index) => ({ entry, index, order: this.controllers.orderOf(entry.kind) }))
      .sort((a, b) => a.order - b.order || a.index - b.index)
      .map(({ entry }) => entry);
  }

  private serviceFields(entry: ResourceEntry): ServiceEntry {
    return this.validator.validate(ServiceEntrySchema, entry, `${entry.kind} "${entry.name}"`, entry.name);
  }

  private applyEndpoints(resource: ResourceBuilder<ServiceResource>, entry: ServiceEntry): void {
    for (const endpoint of entry.endpoints ?? []) {
      resource.withEndpoint({
        name: endpoint.name,
        scheme: endpoint.scheme,
        targetPort: endpoint.targetPort,
        port: endpoint.port,
        protocol: endpoint.protocol,
        transport: endpoint.transport,
        isExternal: endpoint.external,
        env: endpoint.env,
      });
    }
  }

  private applyServiceFields(resource: ResourceBuilder<ServiceResource>, entry: ServiceEntry): void {
    if (entry.args && entry.args.length > 0) {
      resource.withArgs(...entry.args);
    }
    for (const [name, value] of Object.entries(entry.env ?? {})) {
      resource.withEnvironment(name, this.environmentValue(resource, value));
    }
    for (const reference of entry.references ?? []) {
      this.applyReference(resource, reference);
    }
  }

  private environmentValue(
    resource: ResourceBuilder<ServiceResource>,
    value: EnvironmentValueEntry,
  ): EnvironmentValue {
    if (typeof value !== "object") {
      return value;
    }
    if ("parameter" in value) {
      return this.requireParameter(resource, value.parameter);
    }
    if ("expression" in value) {
      return new ReferenceExpression(resource.resource, value.expression);
    }
    const owner =
      value.resource === undefined
        ? resource.resource
        : resource.applicationBuilder.getResource(value.resource);
    return owner.getEndpoint(value.endpoint).property(value.property ?? "url");
  }

  private applyReference(resource: ResourceBuilder<ServiceResource>, reference: ReferenceEntry): void {
    const builder = resource.applicationBuilder;
    if (typeof reference === "string") {
      resource.withReference(builder.getResource(reference));
      return;
    }
    const target = builder.getResource(reference.resource);
    if (reference.serviceDiscovery) {
      if (reference.endpoint === undefined) {
        throw new AppHostError(
          "ERR_INVALID_DEFINITION",
          `Service discovery reference from "${resource.name}" to "${target.name}" needs an endpoint`,
          { resource: resource.name, field: "references" },
        );
      }
      resource.withReference(target.getEndpoint(reference.endpoint));
      return;
    }
    resource.withReference(target, {
      endpoint: reference.endpoint,
      connectionName: reference.connectionName,
    });
  }

  private requireParameter(resource: ResourceBuilder<ServiceResource>, name: string): ParameterResource {
    const parameter = resource.applicationBuilder.getResource(name);
    if (parameter.kind !== "parameter") {
      throw new AppHostError(
        "ERR_INVALID_DEFINITION",
        `Environment of "${resource.name}" names "${name}", which is a ${parameter.kind}, not a parameter`,
        { resource: resource.name, field: "env" },
      );
    }
    return parameter;
  }
}

function isServiceBuilder(
  builder: ResourceBuilder<ModelResource>,
): builder is ResourceBuilder<ServiceResource> {
  return isServiceResource(builder.resource);
}
