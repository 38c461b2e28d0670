/** Field-level parsing for Bilibili API payloads */

const TAG_RE = /<[^>]+>/g;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/** Strip search highlight markup (`<em class="keyword">`) and decode HTML entities */
export function cleanText(raw: string): string {
  return raw
    .replace(TAG_RE, '')
    .replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
      if (entity[0] === '#') {
        const code =
          entity[1] === 'x' || entity[1] === 'X'
            ? parseInt(entity.slice(2), 16)
            : parseInt(entity.slice(1), 10);
        return isScalarValue(code) ? String.fromCodePoint(code) : match;
      }
      return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
    })
    .trim();
}

/** A code point that can appear in a string on its own: in range and not a surrogate */
function isScalarValue(code: number): boolean {
  return Number.isInteger(code) && code >= 0 && code <= 0x10ffff && (code < 0xd800 || code > 0xdfff);
}

/**
 * Parse a duration to seconds. Accepts seconds as a number or `"MM:SS"` /
 * `"H:MM:SS"` strings (minutes may exceed 59, e.g. `"75:02"`).
 */
export function parseDuration(value: string | number | null | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) && value >= 0 ? Math.trunc(value) : null;
  if (!value) return null;

  const parts = value.trim().split(':');
  if (parts.length < 2 || parts.length > 3 || parts.some((p) => !/^\d+$/.test(p))) return null;

  return parts.reduce((total, part) => total * 60 + parseInt(part, 10), 0);
}

/** Parse an engagement counter. Hidden counters (`"--"`) and junk become 0. */
export function parseCount(value: string | number | null | undefined): number {
  if (typeof value === 'number') return Number.isFinite(value) && value > 0 ? Math.trunc(value) : 0;
  if (!value) return 0;

  const match = value.trim().match(/^(\d+(?:\.\d+)?)(万|亿)?$/);
  if (!match) return 0;
  const scale = match[2] === '亿' ? 100_000_000 : match[2] === '万' ? 10_000 : 1;
  return Math.round(parseFloat(match[1]) * scale);
}

/** Unix seconds to Date; 0 or missing means unknown */
export function parseTimestamp(value: number | string | null | undefined): Date | null {
  const seconds = typeof value === 'string' ? Number(value) : value;
  if (seconds === null || seconds === undefined || !Number.isFinite(seconds) || seconds <= 0) return null;
  return new Date(seconds * 1000);
}

export function splitTags(value: string | null | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((t) => t.trim())
    .filter(Boolean);
}
