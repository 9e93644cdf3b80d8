import { ResourceBase } from "./resource.js";

export class ContainerResource extends ResourceBase {
  readonly kind = "container";
}
