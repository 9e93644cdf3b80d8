import { Type } from "@sinclair/typebox";
import type { ResourceController } from "../../controller-registry.js";
import { serviceProperties } from "../../manifest-schemas.js";

export const ProjectSchema = Type.Object(
  {
    kind: Type.Literal("Project"),
    name: Type.String(),
    path: Type.String(),
    ...serviceProperties,
  },
  { additionalProperties: false },
);

export const projectController: ResourceController<typeof ProjectSchema> = {
  kind: "Project",
  schema: ProjectSchema,
  create(entry, { builder }) {
    return builder.addProject(entry.name, entry.path);
  },
};
