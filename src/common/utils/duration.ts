/**
 * Duration strings in the `1h30m`, `5s`, `1.5m`, `250ms` notation used by the
 * CHECK_INTERVAL and REPORT_INTERVAL settings.
 */

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3, // U+00B5
  'μs': 1e-3, // U+03BC
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

// "ms" must be tried before "m" and "s"
const COMPONENT_SOURCE = '(\\d+(?:\\.\\d*)?|\\.\\d+)(ns|us|µs|μs|ms|s|m|h)';

const NS_PER_US = 1e3;
const NS_PER_MS = 1e6;
const NS_PER_SECOND = 1e9;
const NS_PER_MINUTE = 60 * NS_PER_SECOND;
const NS_PER_HOUR = 60 * NS_PER_MINUTE;

/**
 * Parse a duration string into milliseconds (nanosecond precision)
 * @throws Error when the string is not a valid duration
 */
export function parseDuration(input: string): number {
  let rest = input.trim();
  if (!rest) {
    throw new Error('invalid duration ""');
  }

  let sign = 1;
  if (rest.startsWith('-') || rest.startsWith('+')) {
    sign = rest.startsWith('-') ? -1 : 1;
    rest = rest.slice(1);
  }

  if (rest === '0') {
    return 0;
  }
  if (!rest) {
    throw new Error(`invalid duration "${input}"`);
  }

  const pattern = new RegExp(COMPONENT_SOURCE, 'y');
  let total = 0;
  while (pattern.lastIndex < rest.length) {
    const match = pattern.exec(rest);
    if (!match) {
      throw new Error(`invalid duration "${input}"`);
    }
    total += parseFloat(match[1]) * UNIT_MS[match[2]];
  }

  return (sign * Math.round(total * NS_PER_MS)) / NS_PER_MS;
}

/**
 * Render milliseconds the same way the duration notation reads: `5s`, `1m0s`,
 * `1h30m0s`, `1.5s`, `500ms`
 */
export function formatDuration(ms: number): string {
  const sign = ms < 0 ? '-' : '';
  let ns = Math.round(Math.abs(ms) * NS_PER_MS);

  if (ns === 0) {
    return '0s';
  }

  if (ns < NS_PER_SECOND) {
    if (ns < NS_PER_US) return `${sign}${ns}ns`;
    if (ns < NS_PER_MS) return `${sign}${withFraction(ns, NS_PER_US)}µs`;
    return `${sign}${withFraction(ns, NS_PER_MS)}ms`;
  }

  const hours = Math.floor(ns / NS_PER_HOUR);
  ns -= hours * NS_PER_HOUR;
  const minutes = Math.floor(ns / NS_PER_MINUTE);
  ns -= minutes * NS_PER_MINUTE;

  let text = `${withFraction(ns, NS_PER_SECOND)}s`;
  if (hours > 0 || minutes > 0) {
    text = `${minutes}m${text}`;
  }
  if (hours > 0) {
    text = `${hours}h${text}`;
  }
  return `${sign}${text}`;
}

function withFraction(value: number, unit: number): string {
  const whole = Math.floor(value / unit);
  const fraction = value - whole * unit;
  if (fraction === 0) {
    return String(whole);
  }
  const digits = String(unit).length - 1;
  return `${whole}.${String(fraction).padStart(digits, '0').replace(/0+$/, '')}`;
}
