import {
  annotationsOfType,
  findConnectionString,
  type ExecutionContext,
  type GeneratePolicy,
  type ProtocolType,
  type Resource,
} from "@apphost/sdk";
import { EnvironmentVariableEvaluator } from "./environment-evaluator.js";
import { executionContextFor } from "./execution-context.js";
import type { ResourceRegistry } from "./registry.js";
import type {
  ContainerResource,
  ExecutableResource,
  ModelResource,
  ParameterResource,
  ProjectResource,
  ServiceResource,
} from "./resources/index.js";
import { AppHostError } from "./types.js";
import { PublishValueResolver } from "./value-resolvers.js";

export interface ManifestBinding {
  scheme: string;
  protocol: ProtocolType;
  transport: string;
  targetPort?: number;
  external?: boolean;
}

export interface ManifestVolume {
  name?: string;
  target: string;
  readOnly: boolean;
}

export interface ManifestBindMount {
  source: string;
  target: string;
  readOnly: boolean;
}

interface ServiceManifestFields {
  connectionString?: string;
  env?: Record<string, string>;
  bindings?: Record<string, ManifestBinding>;
}

export interface ContainerManifest extends ServiceManifestFields {
  type: "container.v0";
  image: string;
  entrypoint?: string;
  args?: string[];
  volumes?: ManifestVolume[];
  bindMounts?: ManifestBindMount[];
}

export interface ProjectManifest extends ServiceManifestFields {
  type: "project.v0";
  path: string;
}

export interface ExecutableManifest extends ServiceManifestFields {
  type: "executable.v0";
  workingDirectory: string;
  command: string;
  args?: string[];
}

export interface ParameterManifest {
  type: "parameter.v0";
  connectionString?: string;
  value: string;
  inputs: {
    value: {
      type: "string";
      secret?: boolean;
      default?: { generate: ManifestGenerate };
    };
  };
}

export interface ManifestGenerate {
  minLength: number;
  lower?: boolean;
  upper?: boolean;
  numeric?: boolean;
  special?: boolean;
}

export type ManifestResource =
  | ContainerManifest
  | ProjectManifest
  | ExecutableManifest
  | ParameterManifest;

export interface ManifestDocument {
  resources: Record<string, ManifestResource>;
}

/**
 * Renders resources into the deployment manifest.
 *
 * Always resolves through the publish resolver, so every deferred value is a
 * `{identifier.path}` placeholder. Keys are written in a fixed order and the
 * output of `stringify` is byte-stable for the same model.
 */
export class ManifestSerializer {
  private readonly resolver: PublishValueResolver;
  private readonly environment: EnvironmentVariableEvaluator;

  constructor(registry: ResourceRegistry, executionContext?: ExecutionContext) {
    const context =
      executionContext?.isPublishMode === true ? executionContext : executionContextFor("publish");
    this.resolver = new PublishValueResolver(context, registry);
    this.environment = new EnvironmentVariableEvaluator(this.resolver);
  }

  async serialize(resource: ModelResource): Promise<ManifestResource> {
    switch (resource.kind) {
      case "container":
        return this.serializeContainer(resource);
      case "project":
        return this.serializeProject(resource);
      case "executable":
        return this.serializeExecutable(resource);
      case "parameter":
        return this.serializeParameter(resource);
    }
  }

  async serializeApplication(resources: readonly ModelResource[]): Promise<ManifestDocument> {
    const document: ManifestDocument = { resources: {} };
    for (const resource of resources) {
      document.resources[resource.name] = await this.serialize(resource);
    }
    return document;
  }

  private async serializeContainer(resource: ContainerResource): Promise<ContainerManifest> {
    const [image] = annotationsOfType(resource, "container-image");
    if (!image) {
      throw new AppHostError(
        "ERR_INVALID_DEFINITION",
        `Container "${resource.name}" has no image`,
        { resource: resource.name, field: "image" },
      );
    }
    const entrypoint = annotationsOfType(resource, "entrypoint").at(-1)?.entrypoint;
    const args = collectArgs(resource);
    const mounts = annotationsOfType(resource, "mount");
    const volumes = mounts
      .filter((mount) => mount.kind === "volume")
      .map((mount): ManifestVolume => ({
        ...(mount.source !== undefined ? { name: mount.source } : {}),
        target: mount.target,
        readOnly: mount.readOnly,
      }));
    const bindMounts = mounts
      .filter((mount) => mount.kind === "bind")
      .map((mount): ManifestBindMount => ({
        source: mount.source ?? "",
        target: mount.target,
        readOnly: mount.readOnly,
      }));
    const imageName = image.registry ? `${image.registry}/${image.image}` : image.image;

    return {
      type: "container.v0",
      ...(await this.connectionString(resource)),
      image: `${imageName}:${image.tag}`,
      ...(entrypoint !== undefined ? { entrypoint } : {}),
      ...(args.length > 0 ? { args } : {}),
      ...(volumes.length > 0 ? { volumes } : {}),
      ...(bindMounts.length > 0 ? { bindMounts } : {}),
      ...(await this.serviceFields(resource)),
    };
  }

  private async serializeProject(resource: ProjectResource): Promise<ProjectManifest> {
    return {
      type: "project.v0",
      ...(await this.connectionString(resource)),
      path: resource.path,
      ...(await this.serviceFields(resource)),
    };
  }

  private async serializeExecutable(resource: ExecutableResource): Promise<ExecutableManifest> {
    const args = collectArgs(resource);
    return {
      type: "executable.v0",
      ...(await this.connectionString(resource)),
      workingDirectory: resource.workingDirectory,
      command: resource.command,
      ...(args.length > 0 ? { args } : {}),
      ...(await this.serviceFields(resource)),
    };
  }

  private async serializeParameter(resource: ParameterResource): Promise<ParameterManifest> {
    return {
      type: "parameter.v0",
      ...(await this.connectionString(resource)),
      value: `{${resource.name}.inputs.value}`,
      inputs: {
        value: {
          type: "string",
          ...(resource.secret ? { secret: true } : {}),
          ...(resource.generate ? { default: { generate: generateFields(resource.generate) } } : {}),
        },
      },
    };
  }

  private async connectionString(resource: Resource): Promise<{ connectionString?: string }> {
    const annotation = findConnectionString(resource);
    if (!annotation) {
      return {};
    }
    return { connectionString: await this.resolver.template(annotation.template, resource) };
  }

  private async serviceFields(
    resource: ServiceResource,
  ): Promise<Pick<ServiceManifestFields, "env" | "bindings">> {
    const env = await this.environment.evaluate(resource);
    const bindings: Record<string, ManifestBinding> = {};
    for (const endpoint of annotationsOfType(resource, "endpoint")) {
      bindings[endpoint.name] = {
        scheme: endpoint.uriScheme,
        protocol: endpoint.protocol,
        transport: endpoint.transport,
        ...(endpoint.targetPort !== undefined ? { targetPort: endpoint.targetPort } : {}),
        ...(endpoint.isExternal ? { external: true } : {}),
      };
    }
    return {
      ...(env.size > 0 ? { env: Object.fromEntries(env) } : {}),
      ...(Object.keys(bindings).length > 0 ? { bindings } : {}),
    };
  }
}

export function stringifyManifest(document: ManifestDocument | ManifestResource): string {
  return JSON.stringify(document, null, 2);
}

function collectArgs(resource: Resource): string[] {
  return annotationsOfType(resource, "args").flatMap((annotation) => [...annotation.args]);
}

function generateFields(policy: GeneratePolicy): ManifestGenerate {
  return {
    minLength: policy.minLength,
    ...(policy.lower ? {} : { lower: false }),
    ...(policy.upper ? {} : { upper: false }),
    ...(policy.numeric ? {} : { numeric: false }),
    ...(policy.special ? {} : { special: false }),
  };
}
