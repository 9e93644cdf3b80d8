import { ResourceBase } from "./resource.js";

export class ExecutableResource extends ResourceBase {
  readonly kind = "executable";

  constructor(
    name: string,
    readonly command: string,
    readonly workingDirectory: string,
  ) {
    super(name);
  }
}
