import { ResourceBase } from "./resource.js";

export class ProjectResource extends ResourceBase {
  readonly kind = "project";

  constructor(
    name: string,
    readonly path: string,
  ) {
    super(name);
  }
}
