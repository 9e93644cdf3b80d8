import type { GeneratePolicy, ParameterLike, ValueProvider, ValueResolver } from "@apphost/sdk";
import { generatePassword } from "../password.js";
import { AppHostError } from "../types.js";
import { ResourceBase } from "./resource.js";

export type ParameterValueSource = () => string | undefined | Promise<string | undefined>;

export interface ParameterOptions {
  secret?: boolean;
  /** Policy used when no value is configured. */
  generate?: GeneratePolicy;
  /** Configuration key the value is read from, used in error messages. */
  configurationKey: string;
  valueSource: ParameterValueSource;
  onGenerated?: (parameter: ParameterResource) => void;
}

export class ParameterResource extends ResourceBase implements ParameterLike, ValueProvider {
  readonly kind = "parameter";
  readonly secret: boolean;
  readonly generate?: GeneratePolicy;
  readonly configurationKey: string;
  private readonly valueSource: ParameterValueSource;
  private readonly onGenerated?: (parameter: ParameterResource) => void;
  private generated?: Promise<string>;

  constructor(name: string, options: ParameterOptions) {
    super(name);
    this.secret = options.secret ?? false;
    this.generate = options.generate;
    this.configurationKey = options.configurationKey;
    this.valueSource = options.valueSource;
    this.onGenerated = options.onGenerated;
  }

  /**
   * Configured value if present, else a generated one. Generation runs once
   * per process: concurrent first callers share the same pending promise. A
   * failed generation is not cached.
   */
  async getValue(): Promise<string> {
    const configured = await this.valueSource();
    if (configured !== undefined) {
      return configured;
    }
    const policy = this.generate;
    if (!policy) {
      throw new AppHostError(
        "ERR_MISSING_PARAMETER_VALUE",
        `Parameter "${this.name}" has no value. Set configuration key "${this.configurationKey}".`,
        { resource: this.name, field: "value" },
      );
    }
    this.generated ??= this.generateValue(policy).catch((error: unknown) => {
      this.generated = undefined;
      throw error;
    });
    return this.generated;
  }

  async resolve(resolver: ValueResolver): Promise<string> {
    return resolver.parameter(this);
  }

  private async generateValue(policy: GeneratePolicy): Promise<string> {
    const value = generatePassword(policy);
    this.onGenerated?.(this);
    return value;
  }
}
