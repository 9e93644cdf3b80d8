import type { RuntimeEvent } from "@apphost/sdk";
import { registerQdrantControllers } from "@apphost/qdrant";
import {
  ControllerRegistry,
  Loader,
  registerBuiltinControllers,
  stringifyManifest,
  type DistributedApplication,
  type EndpointAllocatorOptions,
} from "@apphost/runtime";

export interface CommandOptions {
  path: string;
  /** Process environment for configuration; defaults to `process.env`. */
  environment?: Record<string, string | undefined>;
  onEvent?: (event: RuntimeEvent) => void;
}

export interface ManifestCommandOptions extends CommandOptions {
  resource?: string;
  outputPath?: string;
}

export interface EnvCommandOptions extends CommandOptions, EndpointAllocatorOptions {
  resource: string;
}

export function createLoader(): Loader {
  const registry = registerQdrantControllers(registerBuiltinControllers(new ControllerRegistry()));
  return new Loader(registry);
}

async function loadApplication(options: CommandOptions, args: string[]): Promise<DistributedApplication> {
  const { onEvent } = options;
  const builder = await createLoader().createBuilder(
    options.path,
    { args, environment: options.environment },
    (builder) => {
      if (onEvent) {
        builder.on("*", onEvent);
      }
    },
  );
  return builder.build();
}

/**
 * Renders the publish manifest of the whole app, or of one resource. With
 * `outputPath` the whole manifest is written there and the path returned.
 */
export async function manifestCommand(options: ManifestCommandOptions): Promise<string> {
  const args = ["--publisher", "manifest"];
  if (options.outputPath !== undefined) {
    args.push("--output-path", options.outputPath);
  }
  const app = await loadApplication(options, args);

  if (options.resource !== undefined) {
    return stringifyManifest(await app.getManifest(options.resource));
  }
  if (options.outputPath !== undefined) {
    return app.publish();
  }
  return stringifyManifest(await app.getApplicationManifest());
}

/** Run-mode environment of one resource as `KEY=value` lines. */
export async function envCommand(options: EnvCommandOptions): Promise<string> {
  const app = await loadApplication(options, []);
  app.allocateEndpoints({ host: options.host, basePort: options.basePort });
  const environment = await app.getEnvironmentVariables(options.resource);
  return Array.from(environment, ([name, value]) => `${name}=${value}`).join("\n");
}
