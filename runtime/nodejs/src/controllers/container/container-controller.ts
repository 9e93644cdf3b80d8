import { Type } from "@sinclair/typebox";
import type { ResourceController } from "../../controller-registry.js";
import { serviceProperties } from "../../manifest-schemas.js";

export const ContainerSchema = Type.Object(
  {
    kind: Type.Literal("Container"),
    name: Type.String(),
    image: Type.String(),
    tag: Type.Optional(Type.String()),
    registry: Type.Optional(Type.String()),
    entrypoint: Type.Optional(Type.String()),
    volumes: Type.Optional(
      Type.Array(
        Type.Object(
          {
            name: Type.Optional(Type.String()),
            target: Type.String(),
            readOnly: Type.Optional(Type.Boolean()),
          },
          { additionalProperties: false },
        ),
      ),
    ),
    bindMounts: Type.Optional(
      Type.Array(
        Type.Object(
          {
            source: Type.String(),
            target: Type.String(),
            readOnly: Type.Optional(Type.Boolean()),
          },
          { additionalProperties: false },
        ),
      ),
    ),
    connectionString: Type.Optional(Type.String()),
    ...serviceProperties,
  },
  { additionalProperties: false },
);

/**
 * Example entry:
 *   kind: Container
 *   name: cache
 *   image: redis
 *   tag: "7.2"
 *   endpoints:
 *     - { name: tcp, targetPort: 6379 }
 *   connectionString: "{tcp.host}:{tcp.port}"
 */
export const containerController: ResourceController<typeof ContainerSchema> = {
  kind: "Container",
  schema: ContainerSchema,
  create(entry, { builder }) {
    const container = builder.addContainer(entry.name, entry.image, entry.tag);
    if (entry.registry !== undefined) {
      container.withImageRegistry(entry.registry);
    }
    if (entry.entrypoint !== undefined) {
      container.withEntrypoint(entry.entrypoint);
    }
    for (const volume of entry.volumes ?? []) {
      container.withVolume(volume.target, { name: volume.name, readOnly: volume.readOnly });
    }
    for (const mount of entry.bindMounts ?? []) {
      container.withBindMount(mount.source, mount.target, mount.readOnly);
    }
    if (entry.connectionString !== undefined) {
      container.withConnectionString(entry.connectionString);
    }
    return container;
  },
};
