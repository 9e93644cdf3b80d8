import { annotationsOfType, type EndpointAnnotation, type Resource } from "@apphost/sdk";
import { AppHostError } from "./types.js";

export interface EndpointAllocatorOptions {
  host?: string;
  basePort?: number;
}

export interface EndpointAllocation {
  resource: string;
  endpoint: string;
  host: string;
  port: number;
}

export const DEFAULT_ALLOCATION_HOST = "localhost";
export const DEFAULT_BASE_PORT = 49152;

/**
 * Run-mode placement of every endpoint that has no allocation yet. A declared
 * `port` is kept; the rest take the next unused port counting up from
 * `basePort`. Ports of existing allocations count as used; two endpoints
 * claiming the same port is `ERR_DUPLICATE_PORT`.
 */
export class EndpointAllocator {
  private readonly host: string;
  private nextPort: number;
  /** Port to the `resource/endpoint` holding it. */
  private readonly used = new Map<number, string>();

  constructor(options: EndpointAllocatorOptions = {}) {
    this.host = options.host ?? DEFAULT_ALLOCATION_HOST;
    this.nextPort = options.basePort ?? DEFAULT_BASE_PORT;
  }

  allocateAll(resources: readonly Resource[]): EndpointAllocation[] {
    const pending: { resource: Resource; endpoint: EndpointAnnotation }[] = [];
    for (const resource of resources) {
      for (const endpoint of annotationsOfType(resource, "endpoint")) {
        const port = endpoint.allocatedEndpoint?.port ?? endpoint.port;
        if (port !== undefined) {
          this.claim(port, resource, endpoint);
        }
        if (!endpoint.allocatedEndpoint) {
          pending.push({ resource, endpoint });
        }
      }
    }

    return pending.map(({ resource, endpoint }) => {
      const port = endpoint.port ?? this.takePort(`${resource.name}/${endpoint.name}`);
      const allocation = endpoint.allocate(this.host, port);
      return {
        resource: resource.name,
        endpoint: endpoint.name,
        host: allocation.host,
        port: allocation.port,
      };
    });
  }

  private claim(port: number, resource: Resource, endpoint: EndpointAnnotation): void {
    const owner = `${resource.name}/${endpoint.name}`;
    const holder = this.used.get(port);
    if (holder !== undefined) {
      throw new AppHostError(
        "ERR_DUPLICATE_PORT",
        `Endpoint "${owner}" uses port ${port}, which is already taken by "${holder}"`,
        { resource: resource.name, field: endpoint.name },
      );
    }
    this.used.set(port, owner);
  }

  private takePort(owner: string): number {
    while (this.used.has(this.nextPort)) {
      this.nextPort += 1;
    }
    const port = this.nextPort;
    this.used.set(port, owner);
    this.nextPort += 1;
    return port;
  }
}
