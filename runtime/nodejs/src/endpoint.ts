import type {
  AllocatedEndpoint,
  EndpointAnnotation,
  EndpointProperty,
  ProtocolType,
  Resource,
  ValueProvider,
  ValueResolver,
} from "@apphost/sdk";

export interface EndpointOptions {
  name?: string;
  targetPort?: number;
  port?: number;
  scheme?: string;
  protocol?: ProtocolType;
  transport?: string;
  isExternal?: boolean;
  /** Environment variable that receives the endpoint's target port. */
  env?: string;
}

export class Endpoint implements EndpointAnnotation {
  readonly type = "endpoint";
  readonly name: string;
  targetPort?: number;
  port?: number;
  isExternal: boolean;
  protocol: ProtocolType;
  transport: string;
  uriScheme: string;
  private allocation?: AllocatedEndpoint;
  private allocations = 0;

  constructor(options: EndpointOptions) {
    const scheme = options.scheme ?? "tcp";
    this.name = options.name ?? scheme;
    this.uriScheme = scheme;
    this.targetPort = options.targetPort;
    this.port = options.port;
    this.protocol = options.protocol ?? "tcp";
    this.transport = options.transport ?? defaultTransport(scheme);
    this.isExternal = options.isExternal ?? false;
  }

  get allocatedEndpoint(): AllocatedEndpoint | undefined {
    return this.allocation;
  }

  get allocationCount(): number {
    return this.allocations;
  }

  /**
   * Binds the endpoint to a concrete address. A second call overwrites the
   * first; `allocationCount` records it so the host can report the reuse.
   */
  allocate(host: string, port: number): AllocatedEndpoint {
    this.allocation = Object.freeze({ host, port });
    this.allocations += 1;
    return this.allocation;
  }
}

function defaultTransport(scheme: string): string {
  return scheme === "http" || scheme === "https" ? "http" : "tcp";
}

export function formatUrl(scheme: string, allocation: AllocatedEndpoint): string {
  return `${scheme}://${allocation.host}:${allocation.port}`;
}

/**
 * Lazy reference to a named endpoint of a resource, resolved per mode.
 */
export class EndpointReference implements ValueProvider {
  constructor(
    readonly resource: Resource,
    readonly endpointName: string,
  ) {}

  property(property: EndpointProperty): EndpointPropertyReference {
    return new EndpointPropertyReference(this, property);
  }

  get url(): EndpointPropertyReference {
    return this.property("url");
  }

  async resolve(resolver: ValueResolver): Promise<string> {
    return resolver.endpoint(this.resource, this.endpointName, "url");
  }
}

export class EndpointPropertyReference implements ValueProvider {
  constructor(
    readonly endpoint: EndpointReference,
    readonly property: EndpointProperty,
  ) {}

  async resolve(resolver: ValueResolver): Promise<string> {
    return resolver.endpoint(this.endpoint.resource, this.endpoint.endpointName, this.property);
  }
}
