import {
  annotationsOfType,
  findEndpoint,
  type EndpointAnnotation,
  type EnvironmentCallback,
  type EnvironmentValue,
  type ExecutionContext,
  type GeneratePolicy,
  type Resource,
  type ResourceAnnotation,
  type RuntimeEventHandler,
} from "@apphost/sdk";
import { DistributedApplication } from "./application.js";
import { Configuration } from "./configuration.js";
import { Endpoint, EndpointReference, type EndpointOptions } from "./endpoint.js";
import { EventBus } from "./events.js";
import { createExecutionContext } from "./execution-context.js";
import type { ManifestResource } from "./manifest-serializer.js";
import { ApplicationModel } from "./model.js";
import { generatePolicy } from "./password.js";
import { ResourceRegistry } from "./registry.js";
import {
  ContainerResource,
  ExecutableResource,
  ParameterResource,
  ProjectResource,
  ResourceBase,
  type ModelResource,
  type ServiceResource,
} from "./resources/index.js";
import { AppHostError } from "./types.js";

export interface DistributedApplicationOptions {
  /** Startup args; `--publisher manifest` selects publish mode. */
  args?: readonly string[];
  configuration?: Record<string, string>;
  /** Defaults to `process.env`. */
  environment?: Record<string, string | undefined>;
  appName?: string;
}

export interface ParameterDeclaration {
  secret?: boolean;
  /** Generate a value when none is configured. `true` uses the default policy. */
  generate?: boolean | Partial<GeneratePolicy>;
  /** Fallback used when configuration has no value. */
  value?: string;
}

export interface ReferenceOptions {
  /** Reference the connection string declared for this endpoint only. */
  endpoint?: string;
  /** Name used in `ConnectionStrings__<name>`; defaults to the resource name. */
  connectionName?: string;
}

export interface VolumeOptions {
  name?: string;
  readOnly?: boolean;
}

type EndpointConfigurator = (endpoint: EndpointAnnotation) => void;

export class DistributedApplicationBuilder {
  readonly executionContext: ExecutionContext;
  readonly configuration: Configuration;
  readonly appName: string;
  readonly model: ApplicationModel;
  private readonly events: EventBus = new EventBus();
  private readonly registry: ResourceRegistry = new ResourceRegistry();

  constructor(options: DistributedApplicationOptions = {}) {
    this.executionContext = createExecutionContext(options.args);
    this.configuration = new Configuration(options.configuration).addEnvironmentVariables(
      options.environment ?? process.env,
    );
    this.appName = options.appName ?? "apphost";
    this.model = new ApplicationModel(this.registry, this.executionContext, this.events);
  }

  on(event: string, handler: RuntimeEventHandler): void {
    this.events.on(event, handler);
  }

  emit(event: string, payload?: Record<string, unknown>): void {
    this.events.emit(event, payload);
  }

  addResource<T extends ModelResource>(resource: T): ResourceBuilder<T> {
    this.registry.register(resource);
    this.emit("Resource.Added", { name: resource.name, kind: resource.kind });
    return new ResourceBuilder(this, resource);
  }

  addContainer(name: string, image: string, tag = "latest"): ResourceBuilder<ContainerResource> {
    return this.addResource(new ContainerResource(name)).withImage(image, tag);
  }

  addProject(name: string, path: string): ResourceBuilder<ProjectResource> {
    return this.addResource(new ProjectResource(name, path));
  }

  addExecutable(
    name: string,
    command: string,
    workingDirectory: string,
    args: readonly string[] = [],
  ): ResourceBuilder<ExecutableResource> {
    const builder = this.addResource(new ExecutableResource(name, command, workingDirectory));
    return args.length > 0 ? builder.withArgs(...args) : builder;
  }

  /**
   * Declares a parameter read from configuration key `Parameters:<name>`.
   */
  addParameter(name: string, declaration: ParameterDeclaration = {}): ResourceBuilder<ParameterResource> {
    const configurationKey = `Parameters:${name}`;
    const generate =
      declaration.generate === undefined || declaration.generate === false
        ? undefined
        : generatePolicy(declaration.generate === true ? {} : declaration.generate);
    return this.addResource(
      new ParameterResource(name, {
        secret: declaration.secret ?? false,
        generate,
        configurationKey,
        valueSource: () => this.configuration.get(configurationKey) ?? declaration.value,
        onGenerated: (parameter) => this.emit("Parameter.Generated", { name: parameter.name }),
      }),
    );
  }

  /**
   * Declares an externally supplied connection string, read from
   * `ConnectionStrings:<name>`. The parameter is its own connection string.
   */
  addConnectionString(name: string): ResourceBuilder<ParameterResource> {
    const configurationKey = `ConnectionStrings:${name}`;
    return this.addResource(
      new ParameterResource(name, {
        secret: true,
        configurationKey,
        valueSource: () => this.configuration.get(configurationKey),
      }),
    ).withConnectionString(`{${name}.value}`);
  }

  getResource(name: string): ModelResource {
    return this.registry.require(name);
  }

  async getEnvironmentVariables(resource: Resource): Promise<Map<string, string>> {
    return this.model.getEnvironmentVariables(resource);
  }

  async getConnectionString(resource: Resource, endpointName?: string): Promise<string> {
    return this.model.getConnectionString(resource, endpointName);
  }

  async getManifest(resource: ModelResource): Promise<ManifestResource> {
    return this.model.getManifest(resource);
  }

  /** Freezes the model. Further builder calls throw `ERR_MODEL_FROZEN`. */
  build(): DistributedApplication {
    this.registry.freeze();
    this.emit("Application.Built", { resources: this.registry.getAll().length });
    return new DistributedApplication(this.model);
  }
}

export class ResourceBuilder<T extends ModelResource> {
  constructor(
    readonly applicationBuilder: DistributedApplicationBuilder,
    readonly resource: T,
  ) {}

  get name(): string {
    return this.resource.name;
  }

  withAnnotation(annotation: ResourceAnnotation): this {
    this.assertMutable();
    this.resource.annotations.push(annotation);
    return this;
  }

  withConnectionString(template: string, endpoint?: string): this {
    return this.withAnnotation({ type: "connection-string", template, endpoint });
  }

  withImage<R extends ContainerResource>(
    this: ResourceBuilder<R>,
    image: string,
    tag = "latest",
  ): ResourceBuilder<R> {
    const [existing] = annotationsOfType(this.resource, "container-image");
    if (existing) {
      this.assertMutable();
      existing.image = image;
      existing.tag = tag;
      return this;
    }
    return this.withAnnotation({ type: "container-image", image, tag });
  }

  withImageRegistry<R extends ContainerResource>(
    this: ResourceBuilder<R>,
    registry: string,
  ): ResourceBuilder<R> {
    this.assertMutable();
    this.requireImage().registry = registry;
    return this;
  }

  withEntrypoint<R extends ContainerResource>(
    this: ResourceBuilder<R>,
    entrypoint: string,
  ): ResourceBuilder<R> {
    return this.withAnnotation({ type: "entrypoint", entrypoint });
  }

  withVolume<R extends ContainerResource>(
    this: ResourceBuilder<R>,
    target: string,
    options: VolumeOptions = {},
  ): ResourceBuilder<R> {
    return this.withAnnotation({
      type: "mount",
      kind: "volume",
      source: options.name,
      target,
      readOnly: options.readOnly ?? false,
    });
  }

  withBindMount<R extends ContainerResource>(
    this: ResourceBuilder<R>,
    source: string,
    target: string,
    readOnly = false,
  ): ResourceBuilder<R> {
    return this.withAnnotation({ type: "mount", kind: "bind", source, target, readOnly });
  }

  withArgs<R extends ServiceResource>(this: ResourceBuilder<R>, ...args: string[]): ResourceBuilder<R> {
    return this.withAnnotation({ type: "args", args });
  }

  /**
   * Declares an endpoint, or with a callback configures (creating it when
   * absent) the endpoint of that name, e.g. to record its allocation.
   */
  withEndpoint<R extends ServiceResource>(
    this: ResourceBuilder<R>,
    options: EndpointOptions,
  ): ResourceBuilder<R>;
  withEndpoint<R extends ServiceResource>(
    this: ResourceBuilder<R>,
    name: string,
    configure: EndpointConfigurator,
  ): ResourceBuilder<R>;
  withEndpoint<R extends ServiceResource>(
    this: ResourceBuilder<R>,
    nameOrOptions: string | EndpointOptions,
    configure?: EndpointConfigurator,
  ): ResourceBuilder<R> {
    if (typeof nameOrOptions !== "string") {
      return this.declareEndpoint(nameOrOptions);
    }
    this.assertMutable();
    const endpoint =
      findEndpoint(this.resource, nameOrOptions) ?? this.createEndpoint({ name: nameOrOptions });
    const before = endpoint.allocationCount;
    configure?.(endpoint);
    if (endpoint.allocationCount > before) {
      this.applicationBuilder.emit(
        endpoint.allocationCount > 1 ? "Endpoint.Reallocated" : "Endpoint.Allocated",
        {
          resource: this.resource.name,
          endpoint: endpoint.name,
          host: endpoint.allocatedEndpoint?.host,
          port: endpoint.allocatedEndpoint?.port,
        },
      );
    }
    return this;
  }

  withHttpEndpoint<R extends ServiceResource>(
    this: ResourceBuilder<R>,
    options: Omit<EndpointOptions, "scheme" | "transport" | "protocol"> = {},
  ): ResourceBuilder<R> {
    return this.declareEndpoint({ ...options, scheme: "http" });
  }

  withHttpsEndpoint<R extends ServiceResource>(
    this: ResourceBuilder<R>,
    options: Omit<EndpointOptions, "scheme" | "transport" | "protocol"> = {},
  ): ResourceBuilder<R> {
    return this.declareEndpoint({ ...options, scheme: "https" });
  }

  withEnvironment<R extends ServiceResource>(
    this: ResourceBuilder<R>,
    callback: EnvironmentCallback,
  ): ResourceBuilder<R>;
  withEnvironment<R extends ServiceResource>(
    this: ResourceBuilder<R>,
    name: string,
    value: EnvironmentValue | ResourceBuilder<ParameterResource>,
  ): ResourceBuilder<R>;
  withEnvironment<R extends ServiceResource>(
    this: ResourceBuilder<R>,
    nameOrCallback: string | EnvironmentCallback,
    value?: EnvironmentValue | ResourceBuilder<ParameterResource>,
  ): ResourceBuilder<R> {
    if (typeof nameOrCallback !== "string") {
      return this.withAnnotation({ type: "environment", callback: nameOrCallback });
    }
    if (value === undefined) {
      throw new AppHostError(
        "ERR_INVALID_DEFINITION",
        `Environment variable "${nameOrCallback}" of "${this.resource.name}" has no value`,
        { resource: this.resource.name, field: nameOrCallback },
      );
    }
    const name = nameOrCallback;
    const entry = value instanceof ResourceBuilder ? value.resource : value;
    return this.withAnnotation({
      type: "environment",
      callback: (context) => context.set(name, entry),
    });
  }

  /**
   * Injects the connection strings of `source`, or for an endpoint reference
   * its service-discovery URL.
   */
  withReference<R extends ServiceResource, S extends ModelResource>(
    this: ResourceBuilder<R>,
    source: ResourceBuilder<S> | S | EndpointReference,
    options: ReferenceOptions = {},
  ): ResourceBuilder<R> {
    if (source instanceof EndpointReference) {
      return this.withAnnotation({
        type: "endpoint-reference",
        resource: source.resource,
        endpoint: source.endpointName,
      });
    }
    const target = source instanceof ResourceBase ? source : source.resource;
    return this.withAnnotation({
      type: "reference",
      target,
      endpoint: options.endpoint,
      connectionName: options.connectionName,
    });
  }

  getEndpoint(name: string): EndpointReference {
    return this.resource.getEndpoint(name);
  }

  async getConnectionString(endpointName?: string): Promise<string> {
    return this.applicationBuilder.getConnectionString(this.resource, endpointName);
  }

  private declareEndpoint(options: EndpointOptions): this {
    const endpoint = new Endpoint(options);
    if (findEndpoint(this.resource, endpoint.name)) {
      throw new AppHostError(
        "ERR_DUPLICATE_ENDPOINT",
        `Endpoint "${endpoint.name}" already exists on resource "${this.resource.name}"`,
        { resource: this.resource.name, field: endpoint.name },
      );
    }
    this.withAnnotation(endpoint);
    const { env } = options;
    if (env !== undefined) {
      const port = this.resource.getEndpoint(endpoint.name).property("targetPort");
      this.withAnnotation({ type: "environment", callback: (context) => context.set(env, port) });
    }
    return this;
  }

  private createEndpoint(options: EndpointOptions): Endpoint {
    const endpoint = new Endpoint(options);
    this.withAnnotation(endpoint);
    return endpoint;
  }

  private requireImage() {
    const [image] = annotationsOfType(this.resource, "container-image");
    if (!image) {
      throw new AppHostError("ERR_INVALID_DEFINITION", `Container "${this.resource.name}" has no image`, {
        resource: this.resource.name,
        field: "image",
      });
    }
    return image;
  }

  private assertMutable(): void {
    this.applicationBuilder.model.registry.assertMutable(this.resource.name);
  }
}
