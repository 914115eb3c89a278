function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Formats epoch milliseconds as "YYYY-MM-DD HH:MM:SS" in UTC. */
export function formatEventTime(epochMs: number): string {
  const date = new Date(epochMs);
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} `
    + `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}
