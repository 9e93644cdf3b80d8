import type { ContainerResource } from "./container.js";
import type { ExecutableResource } from "./executable.js";
import type { ParameterResource } from "./parameter.js";
import type { ProjectResource } from "./project.js";

export { ContainerResource } from "./container.js";
export { ExecutableResource } from "./executable.js";
export { ParameterResource } from "./parameter.js";
export type { ParameterOptions, ParameterValueSource } from "./parameter.js";
export { ProjectResource } from "./project.js";
export { ResourceBase } from "./resource.js";

export type ModelResource = ContainerResource | ProjectResource | ExecutableResource | ParameterResource;

/** Resources that run as processes and so carry endpoints and environment. */
export type ServiceResource = ContainerResource | ProjectResource | ExecutableResource;

export function isServiceResource(resource: ModelResource): resource is ServiceResource {
  return resource.kind !== "parameter";
}
