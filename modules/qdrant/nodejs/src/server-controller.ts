import {
  AppHostError,
  serviceProperties,
  type DistributedApplicationBuilder,
  type ParameterResource,
  type ResourceController,
} from "@apphost/runtime";
import { Type } from "@sinclair/typebox";
import { addQdrant, withDataBindMount, withDataVolume } from "./qdrant-server.js";

export const QdrantServerSchema = Type.Object(
  {
    kind: Type.Literal("Qdrant.Server"),
    name: Type.String(),
    /** Name of a parameter holding the API key. */
    apiKey: Type.Optional(Type.String()),
    grpcPort: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
    httpPort: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
    dataVolume: Type.Optional(Type.Union([Type.Boolean(), Type.String()])),
    dataBindMount: Type.Optional(Type.String()),
    ...serviceProperties,
  },
  { additionalProperties: false },
);

/**
 * Example entry:
 *   kind: Qdrant.Server
 *   name: vectors
 *   apiKey: vectors-key
 *   dataVolume: true
 */
export const qdrantServerController: ResourceController<typeof QdrantServerSchema> = {
  kind: "Qdrant.Server",
  schema: QdrantServerSchema,
  create(entry, { builder }) {
    const apiKey = entry.apiKey === undefined ? undefined : requireParameter(builder, entry.name, entry.apiKey);
    const qdrant = addQdrant(builder, entry.name, {
      apiKey,
      grpcPort: entry.grpcPort,
      httpPort: entry.httpPort,
    });
    if (entry.dataVolume !== undefined && entry.dataVolume !== false) {
      withDataVolume(qdrant, typeof entry.dataVolume === "string" ? entry.dataVolume : undefined);
    }
    if (entry.dataBindMount !== undefined) {
      withDataBindMount(qdrant, entry.dataBindMount);
    }
    return qdrant;
  },
};

function requireParameter(
  builder: DistributedApplicationBuilder,
  server: string,
  name: string,
): ParameterResource {
  const resource = builder.getResource(name);
  if (resource.kind !== "parameter") {
    throw new AppHostError(
      "ERR_INVALID_DEFINITION",
      `Qdrant server "${server}" names "${resource.name}" as its API key, which is not a parameter`,
      { resource: server, field: "apiKey" },
    );
  }
  return resource;
}
