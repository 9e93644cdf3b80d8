import {
  ContainerResource,
  ResourceBuilder,
  type DistributedApplicationBuilder,
  type ParameterResource,
} from "@apphost/runtime";

export const QdrantContainerImageTags = {
  image: "qdrant/qdrant",
  tag: "v1.8.4",
} as const;

export const QDRANT_GRPC_PORT = 6334;
export const QDRANT_REST_PORT = 6333;
export const QDRANT_DATA_PATH = "/qdrant/storage";

/** Endpoint names. `http` carries gRPC, `rest` the REST API and dashboard. */
export const PRIMARY_ENDPOINT_NAME = "http";
export const REST_ENDPOINT_NAME = "rest";

export const API_KEY_ENV = "QDRANT__SERVICE__API_KEY";
export const ENABLE_STATIC_CONTENT_ENV = "QDRANT__SERVICE__ENABLE_STATIC_CONTENT";

export class QdrantServerResource extends ContainerResource {
  constructor(
    name: string,
    readonly apiKeyParameter: ParameterResource,
  ) {
    super(name);
  }
}

export interface QdrantOptions {
  /** Parameter holding the API key; a secret `<name>-Key` parameter is generated when omitted. */
  apiKey?: ResourceBuilder<ParameterResource> | ParameterResource;
  grpcPort?: number;
  httpPort?: number;
}

export function addQdrant(
  builder: DistributedApplicationBuilder,
  name: string,
  options: QdrantOptions = {},
): ResourceBuilder<QdrantServerResource> {
  const apiKey = resolveApiKey(builder, name, options.apiKey);
  const key = `{${apiKey.name}.value}`;

  return builder
    .addResource(new QdrantServerResource(name, apiKey))
    .withImage(QdrantContainerImageTags.image, QdrantContainerImageTags.tag)
    .withHttpEndpoint({
      name: PRIMARY_ENDPOINT_NAME,
      port: options.grpcPort,
      targetPort: QDRANT_GRPC_PORT,
    })
    .withHttpEndpoint({
      name: REST_ENDPOINT_NAME,
      port: options.httpPort,
      targetPort: QDRANT_REST_PORT,
    })
    .withEnvironment((context) => {
      context.set(API_KEY_ENV, apiKey);
      if (context.executionContext.isPublishMode) {
        // The web UI is not exposed outside local runs.
        context.set(ENABLE_STATIC_CONTENT_ENV, "0");
      }
    })
    .withConnectionString(connectionStringTemplate(PRIMARY_ENDPOINT_NAME, key))
    .withConnectionString(connectionStringTemplate(REST_ENDPOINT_NAME, key), REST_ENDPOINT_NAME);
}

/**
 * Adds a named volume at the Qdrant storage path. The default name is
 * `<app>-<resource>-data`.
 */
export function withDataVolume(
  qdrant: ResourceBuilder<QdrantServerResource>,
  name?: string,
  readOnly = false,
): ResourceBuilder<QdrantServerResource> {
  const volumeName = name ?? `${qdrant.applicationBuilder.appName}-${qdrant.name}-data`;
  return qdrant.withVolume(QDRANT_DATA_PATH, { name: volumeName, readOnly });
}

export function withDataBindMount(
  qdrant: ResourceBuilder<QdrantServerResource>,
  source: string,
  readOnly = false,
): ResourceBuilder<QdrantServerResource> {
  return qdrant.withBindMount(source, QDRANT_DATA_PATH, readOnly);
}

function connectionStringTemplate(endpoint: string, key: string): string {
  return `Endpoint={${endpoint}.scheme}://{${endpoint}.host}:{${endpoint}.port};Key=${key}`;
}

function resolveApiKey(
  builder: DistributedApplicationBuilder,
  name: string,
  apiKey: QdrantOptions["apiKey"],
): ParameterResource {
  if (apiKey === undefined) {
    return builder.addParameter(`${name}-Key`, { secret: true, generate: { special: false } }).resource;
  }
  return apiKey instanceof ResourceBuilder ? apiKey.resource : apiKey;
}
