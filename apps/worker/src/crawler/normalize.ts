import type { AudioInfo, CountText, DateText } from "./types";

const COUNT_SUFFIX: Record<string, number> = {
  k: 1_000,
  m: 1_000_000,
  b: 1_000_000_000,
  万: 10_000,
  億: 100_000_000,
  亿: 100_000_000,
};

/**
 * Displayed counters: "1.5M", "12.3K", "3万", "1,024", "87".
 * Unrecognised text keeps `text` and yields a null `value`.
 */
export function parseCount(text: string | null | undefined): CountText {
  if (text === null || text === undefined) return { text: null, value: null };
  const t = text.trim();

  const suffixed = t.match(/^(\d+(?:\.\d+)?)\s*([kmb万億亿])$/i);
  if (suffixed) {
    const factor = COUNT_SUFFIX[suffixed[2].toLowerCase()];
    return { text, value: Math.round(Number(suffixed[1]) * factor) };
  }
  if (/^\d+$/.test(t)) return { text, value: Number(t) };
  if (/^\d{1,3}(,\d{3})+$/.test(t)) return { text, value: Number(t.replace(/,/g, "")) };
  return { text, value: null };
}

type Unit = "s" | "m" | "h" | "d" | "w";

const UNIT_MS: Record<Unit, number> = {
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
};

const EN_UNITS: Record<string, Unit> = {
  s: "s",
  sec: "s",
  secs: "s",
  second: "s",
  seconds: "s",
  m: "m",
  min: "m",
  mins: "m",
  minute: "m",
  minutes: "m",
  h: "h",
  hr: "h",
  hrs: "h",
  hour: "h",
  hours: "h",
  d: "d",
  day: "d",
  days: "d",
  w: "w",
  wk: "w",
  wks: "w",
  week: "w",
  weeks: "w",
};

// TODO: add 日前 once the day-count form has been checked against live ja-JP pages;
// until then "N日前" falls through to a null value.
const JA_UNITS: Record<string, Unit> = {
  秒: "s",
  分: "m",
  時間: "h",
  週間: "w",
};

function utcDate(year: number, month: number, day: number) {
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  return d;
}

function relative(amount: string, unit: Unit | undefined, capturedAt: Date) {
  if (!unit) return null;
  return new Date(capturedAt.getTime() - Number(amount) * UNIT_MS[unit]);
}

/**
 * Post dates as the platform prints them. Relative forms resolve against
 * `capturedAt`; absolute ones are taken as UTC midnight.
 */
export function parseDate(text: string | null | undefined, capturedAt: Date): DateText {
  if (text === null || text === undefined) return { text: null, value: null };
  const t = text.replace(/^[\s·・]+/, "").trim();

  const full = t.match(/^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/);
  if (full) return { text, value: utcDate(Number(full[1]), Number(full[2]), Number(full[3])) };

  const monthDay = t.match(/^(\d{1,2})-(\d{1,2})$/);
  if (monthDay) {
    return { text, value: utcDate(capturedAt.getUTCFullYear(), Number(monthDay[1]), Number(monthDay[2])) };
  }

  const en = t.match(/^(\d+)\s*([a-z]+)\s+ago$/i);
  if (en) return { text, value: relative(en[1], EN_UNITS[en[2].toLowerCase()], capturedAt) };

  const ja = t.match(/^(\d+)\s*(秒|分|時間|週間)前$/);
  if (ja) return { text, value: relative(ja[1], JA_UNITS[ja[2]], capturedAt) };

  return { text, value: null };
}

export interface VideoRef {
  videoId: string;
  videoUrl: string;
  username: string;
}

/** Canonical `<origin>/@user/video/<id>` form of a listing link. */
export function parseVideoUrl(href: string | null | undefined, baseUrl: string): VideoRef | null {
  if (!href) return null;
  let u: URL;
  try {
    u = new URL(href, baseUrl);
  } catch {
    return null;
  }
  const m = u.pathname.match(/\/@([^/]+)\/video\/(\d+)/);
  if (!m) return null;
  return { videoId: m[2], videoUrl: `${u.origin}/@${m[1]}/video/${m[2]}`, username: m[1] };
}

/** Music link `/music/<slug>-<id>` plus the "<title> - <author>" caption. */
export function parseAudio(
  href: string | null | undefined,
  infoText: string | null | undefined,
  baseUrl: string,
): AudioInfo | null {
  const info = infoText?.trim() || null;
  if (!href && !info) return null;

  let url: string | null = null;
  let id: string | null = null;
  if (href) {
    try {
      const u = new URL(href, baseUrl);
      url = u.toString();
      id = u.pathname.match(/\/music\/[^/]*?(\d+)\/?$/)?.[1] ?? null;
    } catch {
      url = href;
    }
  }

  let title: string | null = info;
  let authorName: string | null = null;
  if (info) {
    const sep = info.indexOf(" - ");
    if (sep > 0) {
      title = info.slice(0, sep).trim() || null;
      authorName = info.slice(sep + 3).trim() || null;
    }
  }

  return { url, id, title, authorName, infoText: info };
}
