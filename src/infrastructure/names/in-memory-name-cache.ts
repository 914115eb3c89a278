import type { NameLookup } from '../../application/name-resolution.js';

export interface HostEntry {
  readonly host_id: number;
  readonly name: string;
}

export interface ServiceEntry {
  readonly host_id: number;
  readonly service_id: number;
  readonly description: string;
}

function serviceKey(hostId: number, serviceId: number): string {
  return `${hostId}:${serviceId}`;
}

/**
 * In-memory host/service name cache.
 *
 * Holds one snapshot of the monitoring configuration's names. `replace()`
 * builds the new maps first and swaps both at once, so lookups never see
 * hosts from one snapshot and services from another.
 */
export class InMemoryNameCache implements NameLookup {
  private hosts: ReadonlyMap<number, string> = new Map();
  private services: ReadonlyMap<string, string> = new Map();

  constructor(hosts: readonly HostEntry[] = [], services: readonly ServiceEntry[] = []) {
    this.replace(hosts, services);
  }

  hostname(hostId: number): string | undefined {
    return this.hosts.get(hostId);
  }

  serviceDescription(hostId: number, serviceId: number): string | undefined {
    return this.services.get(serviceKey(hostId, serviceId));
  }

  /** Swaps in a new snapshot. */
  replace(hosts: readonly HostEntry[], services: readonly ServiceEntry[]): void {
    const nextHosts = new Map<number, string>();
    for (const host of hosts) {
      nextHosts.set(host.host_id, host.name);
    }

    const nextServices = new Map<string, string>();
    for (const service of services) {
      nextServices.set(serviceKey(service.host_id, service.service_id), service.description);
    }

    this.hosts = nextHosts;
    this.services = nextServices;
  }

  /** For logging and tests — number of hosts and services held. */
  get size(): { hosts: number; services: number } {
    return { hosts: this.hosts.size, services: this.services.size };
  }
}
