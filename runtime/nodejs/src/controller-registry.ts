import type { Static, TSchema } from "@sinclair/typebox";
import type { DistributedApplicationBuilder, ResourceBuilder } from "./builder.js";
import type { ResourceEntry } from "./manifest-schemas.js";
import type { ModelResource } from "./resources/index.js";
import { SchemaValidator } from "./schema-validator.js";
import { AppHostError } from "./types.js";

export interface ControllerContext {
  readonly builder: DistributedApplicationBuilder;
  /** Directory of the app definition file. */
  readonly baseDir: string;
}

/**
 * Turns one validated app-definition entry of `kind` into a resource.
 * Environment, references and endpoints of service kinds are applied by the
 * loader afterwards.
 */
export interface ResourceController<S extends TSchema = TSchema> {
  readonly kind: string;
  readonly schema: S;
  /** Lower runs first. Parameters use 0 so other kinds can look them up. */
  readonly order?: number;
  create(entry: Static<S>, context: ControllerContext): ResourceBuilder<ModelResource>;
}

interface RegisteredController {
  readonly kind: string;
  readonly order: number;
  create(entry: ResourceEntry, context: ControllerContext): ResourceBuilder<ModelResource>;
}

/**
 * ControllerRegistry: maps app-definition kinds to their controllers and
 * validates each entry against the controller's schema before dispatch.
 */
export class ControllerRegistry {
  private controllersByKind: Map<string, RegisteredController> = new Map();

  constructor(private readonly validator: SchemaValidator = new SchemaValidator()) {}

  register<S extends TSchema>(controller: ResourceController<S>): this {
    this.controllersByKind.set(controller.kind, {
      kind: controller.kind,
      order: controller.order ?? 1,
      create: (entry, context) =>
        controller.create(
          this.validator.validate(controller.schema, entry, `${entry.kind} "${entry.name}"`, entry.name),
          context,
        ),
    });
    return this;
  }

  hasController(kind: string): boolean {
    return this.controllersByKind.has(kind);
  }

  getKinds(): string[] {
    return Array.from(this.controllersByKind.keys());
  }

  orderOf(kind: string): number {
    return this.require(kind).order;
  }

  create(entry: ResourceEntry, context: ControllerContext): ResourceBuilder<ModelResource> {
    return this.require(entry.kind).create(entry, context);
  }

  private require(kind: string): RegisteredController {
    const controller = this.controllersByKind.get(kind);
    if (!controller) {
      throw new AppHostError(
        "ERR_UNKNOWN_KIND",
        `No controller registered for kind "${kind}". Known kinds: ${this.getKinds().join(", ")}`,
      );
    }
    return controller;
  }
}
