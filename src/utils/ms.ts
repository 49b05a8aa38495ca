/**
 * Human durations <-> milliseconds.
 *
 * Accepted: a number followed by a unit, optionally repeated (`1h30m`, `2d 6h`).
 * Units: s/sec, m/min, h/hr, d/day, w/week (plural forms too). Bare numbers are minutes.
 */
const UNIT_MS: Record<string, number> = {
  s: 1_000,
  sec: 1_000,
  secs: 1_000,
  second: 1_000,
  seconds: 1_000,
  m: 60_000,
  min: 60_000,
  mins: 60_000,
  minute: 60_000,
  minutes: 60_000,
  h: 3_600_000,
  hr: 3_600_000,
  hrs: 3_600_000,
  hour: 3_600_000,
  hours: 3_600_000,
  d: 86_400_000,
  day: 86_400_000,
  days: 86_400_000,
  w: 604_800_000,
  week: 604_800_000,
  weeks: 604_800_000,
};

const PART = /(\d+(?:\.\d+)?)\s*([a-z]+)/g;

export function parse(input: string): number | null {
  const text = input.trim().toLowerCase();
  if (!text) return null;
  if (/^\d+$/.test(text)) return Number(text) * UNIT_MS.m;

  let total = 0;
  let consumed = "";
  for (const match of text.matchAll(PART)) {
    const [whole, amount, unit] = match;
    const factor = UNIT_MS[unit];
    if (factor === undefined) return null;
    total += Number(amount) * factor;
    consumed += whole;
  }
  // Reject leftovers such as "1h foo".
  if (consumed.replace(/\s+/g, "") !== text.replace(/\s+/g, "")) return null;
  return total > 0 ? Math.round(total) : null;
}

/** `5400000` → `"1h 30m"`. */
export function format(ms: number): string {
  if (ms < 1_000) return `${Math.max(0, Math.round(ms))}ms`;
  const parts: string[] = [];
  let rest = Math.floor(ms / 1_000);
  const steps: Array<[string, number]> = [
    ["d", 86_400],
    ["h", 3_600],
    ["m", 60],
    ["s", 1],
  ];
  for (const [unit, size] of steps) {
    const value = Math.floor(rest / size);
    if (value > 0) parts.push(`${value}${unit}`);
    rest -= value * size;
  }
  return parts.join(" ");
}
