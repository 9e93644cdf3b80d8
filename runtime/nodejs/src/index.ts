export { DistributedApplication, DEFAULT_MANIFEST_FILE } from "./application.js";
export type { RunResult } from "./application.js";
export { DistributedApplicationBuilder, ResourceBuilder } from "./builder.js";
export type {
  DistributedApplicationOptions,
  ParameterDeclaration,
  ReferenceOptions,
  VolumeOptions,
} from "./builder.js";
export { Configuration } from "./configuration.js";
export { ControllerRegistry } from "./controller-registry.js";
export type { ControllerContext, ResourceController } from "./controller-registry.js";
export {
  connectionStringController,
  containerController,
  executableController,
  parameterController,
  projectController,
  registerBuiltinControllers,
} from "./controllers/index.js";
export {
  Endpoint,
  EndpointPropertyReference,
  EndpointReference,
  formatUrl,
} from "./endpoint.js";
export type { EndpointOptions } from "./endpoint.js";
export {
  DEFAULT_ALLOCATION_HOST,
  DEFAULT_BASE_PORT,
  EndpointAllocator,
} from "./endpoint-allocator.js";
export type { EndpointAllocation, EndpointAllocatorOptions } from "./endpoint-allocator.js";
export { CONNECTION_STRING_PREFIX, EnvironmentVariableEvaluator } from "./environment-evaluator.js";
export { EventBus } from "./events.js";
export { createExecutionContext, executionContextFor } from "./execution-context.js";
export {
  ConnectionStringReference,
  ReferenceExpression,
  parseTemplate,
  renderTemplate,
} from "./expressions.js";
export type { PlaceholderProperty, TemplateSegment } from "./expressions.js";
export { Loader } from "./loader.js";
export {
  AppDefinitionSchema,
  EndpointSchema,
  EnvironmentValueSchema,
  GenerateSchema,
  ReferenceSchema,
  serviceProperties,
} from "./manifest-schemas.js";
export type { AppDefinition, ResourceEntry } from "./manifest-schemas.js";
export { ManifestSerializer, stringifyManifest } from "./manifest-serializer.js";
export type {
  ContainerManifest,
  ExecutableManifest,
  ManifestBinding,
  ManifestBindMount,
  ManifestDocument,
  ManifestGenerate,
  ManifestResource,
  ManifestVolume,
  ParameterManifest,
  ProjectManifest,
} from "./manifest-serializer.js";
export { ApplicationModel } from "./model.js";
export { DEFAULT_GENERATE_POLICY, generatePassword, generatePolicy } from "./password.js";
export { ResourceRegistry, validateResourceName } from "./registry.js";
export {
  ContainerResource,
  ExecutableResource,
  ParameterResource,
  ProjectResource,
  ResourceBase,
  isServiceResource,
} from "./resources/index.js";
export type { ModelResource, ServiceResource } from "./resources/index.js";
export { SchemaValidator } from "./schema-validator.js";
export { AppHostError } from "./types.js";
export type { AppHostErrorCode } from "./types.js";
export {
  PublishValueResolver,
  RunValueResolver,
  createValueResolver,
} from "./value-resolvers.js";
