import crypto from "node:crypto";

export function randomId(prefix?: string) {
  const raw = crypto.randomUUID();
  return prefix ? `${prefix}_${raw}` : raw;
}

export function nowIso() {
  return new Date().toISOString();
}

export function sleep(ms: number) {
  return new Promise<void>((r) => setTimeout(r, ms));
}

/** Random pause between `minMs` and `maxMs`, used between browser actions. */
export function humanPause(minMs: number, maxMs: number) {
  const lo = Math.min(minMs, maxMs);
  const hi = Math.max(minMs, maxMs);
  return sleep(lo + Math.floor(Math.random() * (hi - lo + 1)));
}
