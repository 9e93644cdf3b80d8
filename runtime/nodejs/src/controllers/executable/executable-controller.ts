import { Type } from "@sinclair/typebox";
import type { ResourceController } from "../../controller-registry.js";
import { serviceProperties } from "../../manifest-schemas.js";

export const ExecutableSchema = Type.Object(
  {
    kind: Type.Literal("Executable"),
    name: Type.String(),
    command: Type.String(),
    workingDirectory: Type.Optional(Type.String()),
    ...serviceProperties,
  },
  { additionalProperties: false },
);

export const executableController: ResourceController<typeof ExecutableSchema> = {
  kind: "Executable",
  schema: ExecutableSchema,
  create(entry, { builder }) {
    // Arguments come from the shared `args` field.
    return builder.addExecutable(entry.name, entry.command, entry.workingDirectory ?? ".");
  },
};
