const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  'μs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/y;

export class DurationFormatError extends Error {
  constructor(input: string) {
    super(`invalid duration format "${input}"`);
    this.name = 'DurationFormatError';
  }
}

/**
 * Parses duration strings such as `30s`, `1m30s`, `1.5h` or `250ms` into milliseconds.
 * A bare `0` is accepted; every other value needs a unit on each segment.
 */
export const parseDuration = (input: string): number => {
  let rest = input.trim();
  let sign = 1;
  if (rest.startsWith('-') || rest.startsWith('+')) {
    sign = rest.startsWith('-') ? -1 : 1;
    rest = rest.slice(1);
  }
  if (rest === '0') {
    return 0;
  }
  if (rest === '') {
    throw new DurationFormatError(input);
  }

  let totalMs = 0;
  SEGMENT.lastIndex = 0;
  while (SEGMENT.lastIndex < rest.length) {
    const start = SEGMENT.lastIndex;
    const match = SEGMENT.exec(rest);
    if (!match || match.index !== start) {
      throw new DurationFormatError(input);
    }
    totalMs += Number.parseFloat(match[1]) * UNIT_MS[match[2]];
  }
  return sign * totalMs;
};

export const tryParseDuration = (input: string): number | undefined => {
  try {
    return parseDuration(input);
  } catch {
    return undefined;
  }
};
