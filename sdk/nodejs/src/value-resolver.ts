import type { ExecutionContext } from "./execution-context.js";
import type { ParameterLike, Resource } from "./resource.js";

export type EndpointProperty = "scheme" | "host" | "port" | "url" | "targetPort";

/**
 * Turns deferred values into strings.
 *
 * There is one implementation per execution mode: the run resolver returns
 * concrete values, the publish resolver returns `{identifier.path}`
 * placeholders. Callers never branch on the mode themselves.
 */
export interface ValueResolver {
  readonly executionContext: ExecutionContext;
  endpoint(resource: Resource, endpointName: string, property: EndpointProperty): string;
  parameter(parameter: ParameterLike): Promise<string>;
  /** Default connection string of `resource`, or the one declared for `endpointName`. */
  connectionString(resource: Resource, endpointName?: string): Promise<string>;
  /** Substitutes `{endpoint.field}` and `{parameter.value}` placeholders against `owner`. */
  template(template: string, owner: Resource): Promise<string>;
}

/**
 * A value whose string form depends on the execution mode.
 */
export interface ValueProvider {
  resolve(resolver: ValueResolver): Promise<string>;
}

export function isValueProvider(value: unknown): value is ValueProvider {
  return (
    typeof value === "object" &&
    value !== null &&
    "resolve" in value &&
    typeof value.resolve === "function"
  );
}
