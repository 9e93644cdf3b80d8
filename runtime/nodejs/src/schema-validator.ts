import type { Static, TSchema } from "@sinclair/typebox";
import AjvModule, { type ValidateFunction } from "ajv";
import { formatAjvErrors } from "./manifest-schemas.js";
import { AppHostError } from "./types.js";
const Ajv = AjvModule.default;

export class SchemaValidator {
  private ajv: InstanceType<typeof Ajv>;

  constructor() {
    this.ajv = new Ajv({
      strict: false,
      allErrors: true,
      removeAdditional: false,
      useDefaults: true,
    });
  }

  /**
   * Returns `data` typed by `schema`, or throws `ERR_INVALID_DEFINITION`
   * naming `label` and every schema violation.
   */
  validate<S extends TSchema>(schema: S, data: unknown, label: string, resource?: string): Static<S> {
    const validate = this.compile(schema);
    if (!validate(data)) {
      throw new AppHostError(
        "ERR_INVALID_DEFINITION",
        `Invalid ${label}: ${formatAjvErrors(validate.errors)}`,
        { resource },
      );
    }
    return data;
  }

  // Ajv caches compiled validators per schema object.
  private compile<S extends TSchema>(schema: S): ValidateFunction<Static<S>> {
    return this.ajv.compile<Static<S>>(schema);
  }
}
