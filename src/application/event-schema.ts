import { z } from 'zod';
import { NEB, STORAGE, BAM, HOST_STATUS, SERVICE_STATUS } from '../domain/index.js';
import type {
  RawEvent,
  RawEventKind,
  HostStatusEvent,
  ServiceStatusEvent,
  NebEvent,
  StorageEvent,
  BamEvent,
  UnrecognizedEvent,
} from '../domain/index.js';

const id = z.number().int();
const epochSeconds = z.number().finite();

/** The broker sends acknowledgment either as a boolean or as 0/1. */
const acknowledgedFlag = z
  .union([z.boolean(), z.literal(0), z.literal(1)])
  .transform((value) => value === true || value === 1);

/**
 * Just enough of a payload to pick its variant. Decoding of the rest is
 * deferred to the variant schema.
 */
export const envelopeSchema = z.object({
  category: id,
  element: id,
});

const baseFields = {
  category: id,
  element: id,
  host_id: id.optional(),
  service_id: id.optional(),
  current_state: id.optional(),
  last_check: epochSeconds.optional(),
  output: z.string().optional(),
};

const statusFields = {
  state: id,
  state_type: id,
  acknowledged: acknowledgedFlag.default(false),
  scheduled_downtime_depth: id.min(0),
};

const hostStatusSchema = z
  .object({ ...baseFields, ...statusFields, host_id: id })
  .transform((data): HostStatusEvent => ({ kind: 'host_status', ...data }));

const serviceStatusSchema = z
  .object({ ...baseFields, ...statusFields, service_id: id })
  .transform((data): ServiceStatusEvent => ({ kind: 'service_status', ...data }));

const nebSchema = z
  .object({
    ...baseFields,
    state: id.optional(),
    state_type: id.optional(),
    acknowledged: acknowledgedFlag.optional(),
    scheduled_downtime_depth: id.min(0).optional(),
  })
  .transform((data): NebEvent => ({ kind: 'neb', ...data }));

const storageSchema = z
  .object(baseFields)
  .transform((data): StorageEvent => ({ kind: 'storage', ...data }));

const bamSchema = z
  .object(baseFields)
  .transform((data): BamEvent => ({ kind: 'bam', ...data }));

const unrecognizedSchema = z
  .object(baseFields)
  .transform((data): UnrecognizedEvent => ({ kind: 'unrecognized', ...data }));

/** Variant selected by the (category, element) pair. */
export function eventKind(category: number, element: number): RawEventKind {
  if (category === NEB) {
    if (element === HOST_STATUS) return 'host_status';
    if (element === SERVICE_STATUS) return 'service_status';
    return 'neb';
  }
  if (category === STORAGE) return 'storage';
  if (category === BAM) return 'bam';
  return 'unrecognized';
}

function schemaFor(kind: RawEventKind): z.ZodType<RawEvent, z.ZodTypeDef, unknown> {
  switch (kind) {
    case 'host_status': return hostStatusSchema;
    case 'service_status': return serviceStatusSchema;
    case 'neb': return nebSchema;
    case 'storage': return storageSchema;
    case 'bam': return bamSchema;
    case 'unrecognized': return unrecognizedSchema;
  }
}

export type DecodeResult =
  | { readonly success: true; readonly event: RawEvent }
  | { readonly success: false; readonly issues: readonly z.ZodIssue[] };

/**
 * Decodes an untyped broker payload into a RawEvent.
 *
 * Fields outside the model are stripped. Returns a discriminated result
 * so the caller decides how to surface errors.
 */
export function decodeBrokerEvent(payload: unknown): DecodeResult {
  const envelope = envelopeSchema.safeParse(payload);
  if (!envelope.success) {
    return { success: false, issues: envelope.error.issues };
  }

  const kind = eventKind(envelope.data.category, envelope.data.element);
  const parsed = schemaFor(kind).safeParse(payload);

  return parsed.success
    ? { success: true, event: parsed.data }
    : { success: false, issues: parsed.error.issues };
}
