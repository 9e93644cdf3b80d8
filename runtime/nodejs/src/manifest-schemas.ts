import { Type, type Static } from "@sinclair/typebox";
import type { ErrorObject } from "ajv";

const EndpointPropertySchema = Type.Union([
  Type.Literal("scheme"),
  Type.Literal("host"),
  Type.Literal("port"),
  Type.Literal("url"),
  Type.Literal("targetPort"),
]);

export const EnvironmentValueSchema = Type.Union([
  Type.String(),
  Type.Number(),
  Type.Boolean(),
  Type.Object({ parameter: Type.String() }, { additionalProperties: false }),
  Type.Object({ expression: Type.String() }, { additionalProperties: false }),
  Type.Object(
    {
      endpoint: Type.String(),
      resource: Type.Optional(Type.String()),
      property: Type.Optional(EndpointPropertySchema),
    },
    { additionalProperties: false },
  ),
]);

export const ReferenceSchema = Type.Union([
  Type.String(),
  Type.Object(
    {
      resource: Type.String(),
      endpoint: Type.Optional(Type.String()),
      connectionName: Type.Optional(Type.String()),
      serviceDiscovery: Type.Optional(Type.Boolean()),
    },
    { additionalProperties: false },
  ),
]);

export const EndpointSchema = Type.Object(
  {
    name: Type.Optional(Type.String()),
    scheme: Type.Optional(Type.String()),
    targetPort: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
    port: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
    protocol: Type.Optional(Type.Union([Type.Literal("tcp"), Type.Literal("udp")])),
    transport: Type.Optional(Type.String()),
    external: Type.Optional(Type.Boolean()),
    env: Type.Optional(Type.String()),
  },
  { additionalProperties: false },
);

/** Fields every service resource kind accepts; applied by the loader. */
export const serviceProperties = {
  endpoints: Type.Optional(Type.Array(EndpointSchema)),
  env: Type.Optional(Type.Record(Type.String(), EnvironmentValueSchema)),
  references: Type.Optional(Type.Array(ReferenceSchema)),
  args: Type.Optional(Type.Array(Type.String())),
};

export const ServiceEntrySchema = Type.Object(serviceProperties, { additionalProperties: true });

export const GenerateSchema = Type.Union([
  Type.Boolean(),
  Type.Object(
    {
      minLength: Type.Optional(Type.Integer({ minimum: 1 })),
      lower: Type.Optional(Type.Boolean()),
      upper: Type.Optional(Type.Boolean()),
      numeric: Type.Optional(Type.Boolean()),
      special: Type.Optional(Type.Boolean()),
    },
    { additionalProperties: false },
  ),
]);

export const ParameterDeclarationSchema = Type.Object(
  {
    name: Type.String(),
    secret: Type.Optional(Type.Boolean()),
    value: Type.Optional(Type.String()),
    generate: Type.Optional(GenerateSchema),
  },
  { additionalProperties: false },
);

export const ResourceEntrySchema = Type.Object(
  {
    kind: Type.String(),
    name: Type.String(),
  },
  { additionalProperties: true },
);

export const AppDefinitionSchema = Type.Object(
  {
    name: Type.String(),
    parameters: Type.Optional(Type.Array(ParameterDeclarationSchema)),
    resources: Type.Array(ResourceEntrySchema),
  },
  { additionalProperties: false },
);

export type EnvironmentValueEntry = Static<typeof EnvironmentValueSchema>;
export type ReferenceEntry = Static<typeof ReferenceSchema>;
export type EndpointEntry = Static<typeof EndpointSchema>;
export type ServiceEntry = Static<typeof ServiceEntrySchema>;
export type ParameterDeclarationEntry = Static<typeof ParameterDeclarationSchema>;
export type ResourceEntry = Static<typeof ResourceEntrySchema>;
export type AppDefinition = Static<typeof AppDefinitionSchema>;

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return "Unknown schema error";
  }
  return errors
    .map((err) => {
      const path = err.instancePath && err.instancePath.length > 0 ? err.instancePath : "/";
      const message = err.message || "is invalid";
      return `${path} ${message}`;
    })
    .join("; ");
}
