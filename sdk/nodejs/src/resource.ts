import type { ResourceAnnotation } from "./annotations.js";

export type ResourceKind = "container" | "project" | "executable" | "parameter";

/**
 * A declared unit of the application model.
 *
 * Identity (`name`, `kind`) is fixed at creation; annotations may be appended
 * until the application is built.
 */
export interface Resource {
  readonly name: string;
  readonly kind: ResourceKind;
  readonly annotations: readonly ResourceAnnotation[];
}

export interface GeneratePolicy {
  minLength: number;
  lower: boolean;
  upper: boolean;
  numeric: boolean;
  special: boolean;
}

export interface ParameterLike extends Resource {
  readonly kind: "parameter";
  readonly secret: boolean;
  readonly generate?: GeneratePolicy;
  getValue(): Promise<string>;
}

export function isParameter(resource: Resource): resource is ParameterLike {
  return resource.kind === "parameter";
}
