import {
  annotationsOfType,
  findConnectionString,
  isValueProvider,
  type EnvironmentCallbackContext,
  type EnvironmentValue,
  type Resource,
  type ValueResolver,
} from "@apphost/sdk";
import { EndpointReference } from "./endpoint.js";
import { ConnectionStringReference } from "./expressions.js";
import { AppHostError } from "./types.js";

export const CONNECTION_STRING_PREFIX = "ConnectionStrings__";

/**
 * Builds the ordered environment of a resource.
 *
 * Environment callbacks run first, one at a time in declaration order; the
 * entries injected by references follow, in reference order. Values are
 * resolved last, sequentially, through the resolver of the active mode.
 */
export class EnvironmentVariableEvaluator {
  constructor(private readonly resolver: ValueResolver) {}

  async evaluate(resource: Resource): Promise<Map<string, string>> {
    const values = await this.collect(resource);
    const environment = new Map<string, string>();
    for (const [name, value] of values) {
      environment.set(name, await this.resolveValue(value));
    }
    return environment;
  }

  /** Unresolved entries, in output order. */
  async collect(resource: Resource): Promise<Map<string, EnvironmentValue>> {
    const values = new Map<string, EnvironmentValue>();
    const context: EnvironmentCallbackContext = {
      executionContext: this.resolver.executionContext,
      resource,
      set: (name, value) => {
        values.set(name, value);
      },
    };

    for (const annotation of annotationsOfType(resource, "environment")) {
      await annotation.callback(context);
    }

    for (const reference of annotationsOfType(resource, "reference")) {
      const { target, endpoint } = reference;
      const connectionName = reference.connectionName ?? target.name;

      if (endpoint !== undefined) {
        this.requireConnectionString(resource, target, endpoint);
        values.set(
          `${CONNECTION_STRING_PREFIX}${connectionName}_${endpoint}`,
          new ConnectionStringReference(target, endpoint),
        );
        continue;
      }

      this.requireConnectionString(resource, target);
      values.set(`${CONNECTION_STRING_PREFIX}${connectionName}`, new ConnectionStringReference(target));
      for (const named of annotationsOfType(target, "connection-string")) {
        if (named.endpoint === undefined) {
          continue;
        }
        values.set(
          `${CONNECTION_STRING_PREFIX}${connectionName}_${named.endpoint}`,
          new ConnectionStringReference(target, named.endpoint),
        );
      }
    }

    for (const reference of annotationsOfType(resource, "endpoint-reference")) {
      values.set(
        `services__${reference.resource.name}__${reference.endpoint}__0`,
        new EndpointReference(reference.resource, reference.endpoint),
      );
    }

    return values;
  }

  private async resolveValue(value: EnvironmentValue): Promise<string> {
    if (isValueProvider(value)) {
      return value.resolve(this.resolver);
    }
    return String(value);
  }

  private requireConnectionString(resource: Resource, target: Resource, endpoint?: string): void {
    if (findConnectionString(target, endpoint)) {
      return;
    }
    const what = endpoint === undefined ? "a connection string" : `a connection string for endpoint "${endpoint}"`;
    throw new AppHostError(
      "ERR_MISSING_CONNECTION_STRING",
      `Resource "${resource.name}" references "${target.name}", which does not provide ${what}`,
      { resource: resource.name, field: target.name },
    );
  }
}
