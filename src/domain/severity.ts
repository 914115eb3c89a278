/** Which severity table applies: host status vs. everything else. */
export type ElementKind = 'host' | 'service';

/** Severity used when the state is missing or outside the table. */
export const DEFAULT_SEVERITY = 5;

/**
 * Service states → alerting API severity.
 *
 * The API treats lower numbers as more urgent, so critical (2) maps to 1
 * and warning (1) to 3. Reproduced as-is from the API's convention.
 */
const SERVICE_SEVERITY: Readonly<Record<number, number>> = {
  0: 0, // ok
  1: 3, // warning
  2: 1, // critical
  3: 4, // unknown
};

/**
 * Maps a raw monitoring state to the alerting API's severity scale.
 *
 * Pure function, no configuration.
 */
export function mapSeverity(kind: ElementKind, currentState: number | undefined): number {
  if (currentState === undefined) return DEFAULT_SEVERITY;

  if (kind === 'host') {
    // up → 0, down/unreachable → 1
    return currentState === 0 ? 0 : 1;
  }

  return SERVICE_SEVERITY[currentState] ?? DEFAULT_SEVERITY;
}
