import type { EnvironmentCallback } from "./environment.js";
import type { Resource } from "./resource.js";

export type ProtocolType = "tcp" | "udp";

export interface ContainerImageAnnotation {
  readonly type: "container-image";
  image: string;
  tag: string;
  registry?: string;
}

export interface AllocatedEndpoint {
  readonly host: string;
  readonly port: number;
}

/**
 * A named network binding. `allocatedEndpoint` is only ever set in run mode,
 * once the host has placed the resource.
 */
export interface EndpointAnnotation {
  readonly type: "endpoint";
  readonly name: string;
  targetPort?: number;
  port?: number;
  isExternal: boolean;
  protocol: ProtocolType;
  transport: string;
  uriScheme: string;
  readonly allocatedEndpoint?: AllocatedEndpoint;
  /** Number of times `allocate` has been called. */
  readonly allocationCount: number;
  allocate(host: string, port: number): AllocatedEndpoint;
}

export interface EnvironmentCallbackAnnotation {
  readonly type: "environment";
  readonly callback: EnvironmentCallback;
}

/**
 * Connection string template. Without `endpoint` it is the resource's default
 * connection string; with it, the one handed to references of that endpoint.
 */
export interface ConnectionStringAnnotation {
  readonly type: "connection-string";
  readonly template: string;
  readonly endpoint?: string;
}

export interface ReferenceAnnotation {
  readonly type: "reference";
  readonly target: Resource;
  readonly endpoint?: string;
  readonly connectionName?: string;
}

export interface EndpointReferenceAnnotation {
  readonly type: "endpoint-reference";
  readonly resource: Resource;
  readonly endpoint: string;
}

export interface ArgsAnnotation {
  readonly type: "args";
  readonly args: readonly string[];
}

export interface EntrypointAnnotation {
  readonly type: "entrypoint";
  readonly entrypoint: string;
}

export interface MountAnnotation {
  readonly type: "mount";
  readonly kind: "volume" | "bind";
  readonly source?: string;
  readonly target: string;
  readonly readOnly: boolean;
}

export type ResourceAnnotation =
  | ContainerImageAnnotation
  | EndpointAnnotation
  | EnvironmentCallbackAnnotation
  | ConnectionStringAnnotation
  | ReferenceAnnotation
  | EndpointReferenceAnnotation
  | ArgsAnnotation
  | EntrypointAnnotation
  | MountAnnotation;

export type AnnotationType = ResourceAnnotation["type"];

export type AnnotationOfType<T extends AnnotationType> = Extract<ResourceAnnotation, { type: T }>;

/**
 * Returns the annotations of one variant, in declaration order.
 */
export function annotationsOfType<T extends AnnotationType>(
  resource: Resource,
  type: T,
): AnnotationOfType<T>[] {
  return resource.annotations.filter(
    (annotation): annotation is AnnotationOfType<T> => annotation.type === type,
  );
}

/** First endpoint with the given name; later duplicates are never consulted. */
export function findEndpoint(resource: Resource, name: string): EndpointAnnotation | undefined {
  return annotationsOfType(resource, "endpoint").find((endpoint) => endpoint.name === name);
}

export function findConnectionString(
  resource: Resource,
  endpoint?: string,
): ConnectionStringAnnotation | undefined {
  return annotationsOfType(resource, "connection-string").find(
    (annotation) => annotation.endpoint === endpoint,
  );
}
