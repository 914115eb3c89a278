import { vi } from 'vitest';
import { HOST_STATUS, NEB, SERVICE_STATUS } from '../../src/domain/index.js';
import type {
  AcceptanceCriteria,
  HostStatusEvent,
  NebEvent,
  ServiceStatusEvent,
} from '../../src/domain/index.js';

/** 2026-01-01 11:50:45 UTC, in epoch seconds. */
export const LAST_CHECK = 1767268245;

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
  } as unknown as import('pino').Logger;
}

/** Criteria matching the connector defaults. */
export function makeCriteria(overrides: Partial<AcceptanceCriteria> = {}): AcceptanceCriteria {
  return {
    hostStatuses: new Set([0, 1, 2]),
    serviceStatuses: new Set([0, 1, 2, 3]),
    hardOnly: 1,
    acknowledged: 0,
    inDowntime: 0,
    skipAnonymousEvents: true,
    ...overrides,
  };
}

/**
 * Factory for a hard, unacknowledged host status event outside downtime.
 * Override any field via the partial parameter.
 */
export function makeHostStatus(overrides: Partial<HostStatusEvent> = {}): HostStatusEvent {
  return {
    kind: 'host_status',
    category: NEB,
    element: HOST_STATUS,
    host_id: 1,
    state: 0,
    state_type: 1,
    acknowledged: false,
    scheduled_downtime_depth: 0,
    current_state: 0,
    last_check: LAST_CHECK,
    output: 'PING OK',
    ...overrides,
  };
}

export function makeServiceStatus(overrides: Partial<ServiceStatusEvent> = {}): ServiceStatusEvent {
  return {
    kind: 'service_status',
    category: NEB,
    element: SERVICE_STATUS,
    host_id: 1,
    service_id: 10,
    state: 0,
    state_type: 1,
    acknowledged: false,
    scheduled_downtime_depth: 0,
    current_state: 0,
    last_check: LAST_CHECK,
    output: 'HTTP OK',
    ...overrides,
  };
}

/** A neb log_entry (element 17) with no status fields. */
export function makeNebEvent(overrides: Partial<NebEvent> = {}): NebEvent {
  return {
    kind: 'neb',
    category: NEB,
    element: 17,
    ...overrides,
  };
}

/** Wire payload for a host status event, as the broker sends it. */
export function hostStatusPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    category: NEB,
    element: HOST_STATUS,
    host_id: 1,
    state: 2,
    state_type: 1,
    acknowledged: false,
    scheduled_downtime_depth: 0,
    current_state: 2,
    last_check: LAST_CHECK,
    output: 'CRITICAL - Host Unreachable',
    ...overrides,
  };
}

/** Wire payload for a service status event, as the broker sends it. */
export function serviceStatusPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    category: NEB,
    element: SERVICE_STATUS,
    host_id: 1,
    service_id: 10,
    state: 1,
    state_type: 1,
    acknowledged: 0,
    scheduled_downtime_depth: 0,
    current_state: 1,
    last_check: LAST_CHECK,
    output: 'WARNING - load average 5.2',
    ...overrides,
  };
}
