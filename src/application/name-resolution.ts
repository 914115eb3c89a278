import type { Logger } from 'pino';

/**
 * Host and service name lookup.
 *
 * Implementations return `undefined` for ids they do not know; the
 * fallback policy lives in the resolve helpers below.
 */
export interface NameLookup {
  hostname(hostId: number): string | undefined;
  serviceDescription(hostId: number, serviceId: number): string | undefined;
}

/** Display string used when the event carries no id at all. */
export const UNKNOWN_NAME = 'unknown';

/**
 * Resolves a host name, degrading to the raw id (as a string) with a
 * warning when the lookup has no entry.
 */
export function resolveHostname(
  names: NameLookup,
  log: Logger,
  hostId: number | undefined,
): string {
  if (hostId === undefined) {
    log.warn('Event has no host id, using placeholder hostname');
    return UNKNOWN_NAME;
  }

  const hostname = names.hostname(hostId);
  if (hostname === undefined) {
    log.warn({ host_id: hostId }, 'Hostname not found, using host id');
    return String(hostId);
  }
  return hostname;
}

/** Resolves a service description with the same fallback policy, keyed on service id. */
export function resolveServiceDescription(
  names: NameLookup,
  log: Logger,
  hostId: number | undefined,
  serviceId: number | undefined,
): string {
  if (serviceId === undefined) {
    log.warn({ host_id: hostId }, 'Event has no service id, using placeholder description');
    return UNKNOWN_NAME;
  }

  const description = hostId === undefined ? undefined : names.serviceDescription(hostId, serviceId);
  if (description === undefined) {
    log.warn({ host_id: hostId, service_id: serviceId }, 'Service description not found, using service id');
    return String(serviceId);
  }
  return description;
}
