/**
 * Broker event taxonomy.
 *
 * Closed tables mapping category names and per-category element names
 * to their numeric wire identifiers. The (category, element) pair is the
 * real key: an element id means nothing without its category.
 *
 * Unknown identifiers are never an error here — they simply fail
 * acceptance, so newer broker versions can emit element types this
 * connector does not know yet.
 */

export const CATEGORIES = {
  neb: 1,
  bbdo: 2,
  storage: 3,
  correlation: 4,
  dumper: 5,
  bam: 6,
  extcmd: 7,
} as const;

export type CategoryName = keyof typeof CATEGORIES;

const NEB_ELEMENTS = {
  acknowledgement: 1,
  comment: 2,
  custom_variable: 3,
  custom_variable_status: 4,
  downtime: 5,
  event_handler: 6,
  flapping_status: 7,
  host_check: 8,
  host_dependency: 9,
  host_group: 10,
  host_group_member: 11,
  host: 12,
  host_parent: 13,
  host_status: 14,
  instance: 15,
  instance_status: 16,
  log_entry: 17,
  module: 18,
  service_check: 19,
  service_dependency: 20,
  service_group: 21,
  service_group_member: 22,
  service: 23,
  service_status: 24,
  instance_configuration: 25,
} as const;

const STORAGE_ELEMENTS = {
  metric: 1,
  rebuild: 2,
  remove_graph: 3,
  status: 4,
  index_mapping: 5,
  metric_mapping: 6,
} as const;

const BAM_ELEMENTS = {
  ba_status: 1,
  kpi_status: 2,
  meta_service_status: 3,
  ba_event: 4,
  kpi_event: 5,
  ba_duration_event: 6,
  dimension_ba_event: 7,
  dimension_kpi_event: 8,
  dimension_ba_bv_relation_event: 9,
  dimension_bv_event: 10,
  dimension_truncate_table_signal: 11,
  bam_rebuild: 12,
  dimension_timeperiod: 13,
  dimension_ba_timeperiod_relation: 14,
  dimension_timeperiod_exception: 15,
  dimension_timeperiod_exclusion: 16,
  inherited_downtime: 17,
} as const;

/** Element tables, keyed by owning category. Categories absent here carry no elements. */
export const ELEMENTS: Readonly<Partial<Record<CategoryName, Readonly<Record<string, number>>>>> = {
  neb: NEB_ELEMENTS,
  storage: STORAGE_ELEMENTS,
  bam: BAM_ELEMENTS,
};

export type NebElementName = keyof typeof NEB_ELEMENTS;
export type StorageElementName = keyof typeof STORAGE_ELEMENTS;
export type BamElementName = keyof typeof BAM_ELEMENTS;

/** Identifiers the classification rules dispatch on. */
export const NEB = CATEGORIES.neb;
export const STORAGE = CATEGORIES.storage;
export const BAM = CATEGORIES.bam;
export const HOST_STATUS = NEB_ELEMENTS.host_status;
export const SERVICE_STATUS = NEB_ELEMENTS.service_status;

export function isCategoryName(name: string): name is CategoryName {
  return Object.prototype.hasOwnProperty.call(CATEGORIES, name);
}

export function categoryId(name: string): number | undefined {
  return isCategoryName(name) ? CATEGORIES[name] : undefined;
}

export function categoryName(id: number): CategoryName | undefined {
  for (const [name, value] of Object.entries(CATEGORIES)) {
    if (value === id && isCategoryName(name)) return name;
  }
  return undefined;
}

function elementTable(category: number): Readonly<Record<string, number>> | undefined {
  const name = categoryName(category);
  return name === undefined ? undefined : ELEMENTS[name];
}

export function elementId(category: number, name: string): number | undefined {
  const table = elementTable(category);
  if (table === undefined || !Object.prototype.hasOwnProperty.call(table, name)) {
    return undefined;
  }
  return table[name];
}

export function elementName(category: number, element: number): string | undefined {
  const table = elementTable(category);
  if (table === undefined) return undefined;

  for (const [name, value] of Object.entries(table)) {
    if (value === element) return name;
  }
  return undefined;
}

/** True when `name` is an element of at least one category table. */
export function isKnownElementName(name: string): boolean {
  return Object.values(ELEMENTS).some(
    (table) => table !== undefined && Object.prototype.hasOwnProperty.call(table, name),
  );
}

/** True iff the category identified by `category` is named in `accepted`. */
export function categoryAccepted(accepted: ReadonlySet<CategoryName>, category: number): boolean {
  const name = categoryName(category);
  return name !== undefined && accepted.has(name);
}

/**
 * True iff the element identified by (category, element) carries one of
 * the accepted names. Names are matched inside the event's own category.
 */
export function elementAccepted(
  accepted: ReadonlySet<string>,
  category: number,
  element: number,
): boolean {
  const name = elementName(category, element);
  return name !== undefined && accepted.has(name);
}
