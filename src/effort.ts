/**
 * Effort duration parsing ("2h 15min" → 135)
 */

interface UnitMarker {
  marker: string;
  minutes: number;
}

/**
 * Known unit markers. Order matters: `min` is tried before `h`.
 */
export const UNIT_MARKERS: readonly UnitMarker[] = [
  { marker: 'min', minutes: 1 },
  { marker: 'h', minutes: 60 },
];

const MARKER_PATTERN = new RegExp(`(${UNIT_MARKERS.map((u) => u.marker).join('|')})`, 'g');
const TOKEN_PATTERN = new RegExp(`^(\\d+)(${UNIT_MARKERS.map((u) => u.marker).join('|')})$`);

/**
 * First pass: split after every unit marker so glued tokens ("1h30min")
 * become separate words
 */
function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(MARKER_PATTERN, '$1 ')
    .split(/\s+/)
    .filter((token) => token.length > 0);
}

/**
 * Second pass: minutes for one `<digits><unit>` token, 0 for anything else
 */
function tokenMinutes(token: string): number {
  const match = TOKEN_PATTERN.exec(token);
  if (!match) {
    return 0;
  }
  const unit = UNIT_MARKERS.find((u) => u.marker === match[2]);
  return unit ? Number.parseInt(match[1], 10) * unit.minutes : 0;
}

/**
 * Parse a duration string into whole minutes
 *
 * Unparseable tokens count as zero, so callers cannot tell "no effort" from
 * "unreadable effort".
 */
export function parseEffort(text: unknown): number {
  if (typeof text !== 'string') {
    return 0;
  }
  return tokenize(text).reduce((total, token) => total + tokenMinutes(token), 0);
}
