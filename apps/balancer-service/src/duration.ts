/**
 * Milliseconds per duration unit
 */
const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000
};

const SEGMENT = /^(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/;

/**
 * Parse a duration such as "300ms", "2s", "1m30s" or "1.5h" into milliseconds.
 * Numbers are taken as milliseconds already.
 * @returns milliseconds, or null if the value is not a valid duration
 */
export function parseDuration(value: string | number): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  let rest = value.trim();
  let sign = 1;
  if (rest.startsWith('-') || rest.startsWith('+')) {
    sign = rest.startsWith('-') ? -1 : 1;
    rest = rest.slice(1);
  }

  if (rest === '0') {
    return 0;
  }
  if (rest === '') {
    return null;
  }

  let total = 0;
  while (rest.length > 0) {
    const match = SEGMENT.exec(rest);
    if (!match) {
      return null;
    }
    total += parseFloat(match[1]) * UNIT_MS[match[2]];
    rest = rest.slice(match[0].length);
  }

  return sign * total;
}
