import { Type } from "@sinclair/typebox";
import type { ResourceController } from "../../controller-registry.js";
import { GenerateSchema } from "../../manifest-schemas.js";

export const ParameterSchema = Type.Object(
  {
    kind: Type.Literal("Parameter"),
    name: Type.String(),
    secret: Type.Optional(Type.Boolean()),
    value: Type.Optional(Type.String()),
    generate: Type.Optional(GenerateSchema),
  },
  { additionalProperties: false },
);

export const ConnectionStringSchema = Type.Object(
  {
    kind: Type.Literal("ConnectionString"),
    name: Type.String(),
    value: Type.Optional(Type.String()),
  },
  { additionalProperties: false },
);

export const parameterController: ResourceController<typeof ParameterSchema> = {
  kind: "Parameter",
  schema: ParameterSchema,
  order: 0,
  create(entry, { builder }) {
    return builder.addParameter(entry.name, {
      secret: entry.secret,
      value: entry.value,
      generate: entry.generate,
    });
  },
};

/**
 * `value` seeds `ConnectionStrings:<name>` unless configuration already has it.
 */
export const connectionStringController: ResourceController<typeof ConnectionStringSchema> = {
  kind: "ConnectionString",
  schema: ConnectionStringSchema,
  order: 0,
  create(entry, { builder }) {
    const key = `ConnectionStrings:${entry.name}`;
    if (entry.value !== undefined && !builder.configuration.has(key)) {
      builder.configuration.set(key, entry.value);
    }
    return builder.addConnectionString(entry.name);
  },
};
