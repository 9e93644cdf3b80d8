import type { Resource, ResourceAnnotation, ResourceKind } from "@apphost/sdk";
import { EndpointReference } from "../endpoint.js";

export abstract class ResourceBase implements Resource {
  abstract readonly kind: ResourceKind;
  readonly annotations: ResourceAnnotation[] = [];

  constructor(readonly name: string) {}

  getEndpoint(name: string): EndpointReference {
    return new EndpointReference(this, name);
  }
}
