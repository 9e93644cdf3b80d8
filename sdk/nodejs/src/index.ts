export { annotationsOfType, findConnectionString, findEndpoint } from "./annotations.js";
export type {
  AllocatedEndpoint,
  AnnotationOfType,
  AnnotationType,
  ArgsAnnotation,
  ConnectionStringAnnotation,
  ContainerImageAnnotation,
  EndpointAnnotation,
  EndpointReferenceAnnotation,
  EntrypointAnnotation,
  EnvironmentCallbackAnnotation,
  MountAnnotation,
  ProtocolType,
  ReferenceAnnotation,
  ResourceAnnotation,
} from "./annotations.js";
export type {
  EnvironmentCallback,
  EnvironmentCallbackContext,
  EnvironmentValue,
} from "./environment.js";
export type { ExecutionContext, ExecutionMode } from "./execution-context.js";
export { isParameter } from "./resource.js";
export type { GeneratePolicy, ParameterLike, Resource, ResourceKind } from "./resource.js";
export { isValueProvider } from "./value-resolver.js";
export type { EndpointProperty, ValueProvider, ValueResolver } from "./value-resolver.js";
export type { RuntimeEvent, RuntimeEventHandler } from "./runtime-event.js";
