export type {
  AllocatedEndpoint,
  EndpointAnnotation,
  EnvironmentCallback,
  EnvironmentCallbackContext,
  EnvironmentValue,
  ExecutionContext,
  ExecutionMode,
  Resource,
  ResourceAnnotation,
  ResourceKind,
  RuntimeEvent,
  ValueProvider,
  ValueResolver,
} from "@apphost/sdk";

export type AppHostErrorCode =
  | "ERR_DUPLICATE_RESOURCE"
  | "ERR_DUPLICATE_ENDPOINT"
  | "ERR_DUPLICATE_PORT"
  | "ERR_INVALID_NAME"
  | "ERR_UNRESOLVED_PLACEHOLDER"
  | "ERR_MISSING_ALLOCATION"
  | "ERR_MISSING_CONNECTION_STRING"
  | "ERR_MISSING_PARAMETER_VALUE"
  | "ERR_ENDPOINT_NOT_FOUND"
  | "ERR_RESOURCE_NOT_FOUND"
  | "ERR_MODEL_FROZEN"
  | "ERR_UNKNOWN_PUBLISHER"
  | "ERR_INVALID_DEFINITION"
  | "ERR_UNKNOWN_KIND";

export class AppHostError extends Error {
  readonly resource?: string;
  readonly field?: string;

  constructor(
    public code: AppHostErrorCode,
    message: string,
    details: { resource?: string; field?: string } = {},
  ) {
    super(message);
    this.name = "AppHostError";
    this.resource = details.resource;
    this.field = details.field;
  }
}
