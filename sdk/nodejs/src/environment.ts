import type { ExecutionContext } from "./execution-context.js";
import type { Resource } from "./resource.js";
import type { ValueProvider } from "./value-resolver.js";

export type EnvironmentValue = string | number | boolean | ValueProvider;

export interface EnvironmentCallbackContext {
  readonly executionContext: ExecutionContext;
  readonly resource: Resource;
  set(name: string, value: EnvironmentValue): void;
}

export type EnvironmentCallback = (context: EnvironmentCallbackContext) => void | Promise<void>;
