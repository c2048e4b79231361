export type ProbeSection = Record<string, unknown>;

export class ProbeFieldError extends Error {
  constructor(
    readonly field: string,
    readonly value: unknown,
  ) {
    super(`invalid numeric value for ${field}: ${JSON.stringify(value)}`);
    this.name = 'ProbeFieldError';
  }
}

// ffprobe prints N/A for values it could not determine
const UNAVAILABLE = 'N/A';
const INTEGER_PATTERN = /^[+-]?\d+$/;

export function isSection(value: unknown): value is ProbeSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function sectionOf(tree: ProbeSection, key: string): ProbeSection {
  const value = tree[key];
  return isSection(value) ? value : {};
}

export function sectionListOf(tree: ProbeSection, key: string): ProbeSection[] {
  const value = tree[key];
  return Array.isArray(value) ? value.filter(isSection) : [];
}

export function findStream(
  streams: ProbeSection[],
  codecType: string,
): ProbeSection | undefined {
  return streams.find((s) => s.codec_type === codecType);
}

function isAbsent(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    (typeof value === 'string' && value.trim() === UNAVAILABLE)
  );
}

/** Reads a float; a missing value reads as 0, a non-numeric one throws. */
export function readFloat(section: ProbeSection, key: string): number {
  const value = section[key];
  if (isAbsent(value)) {
    return 0;
  }

  const parsed =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && value.trim() !== ''
        ? Number(value)
        : NaN;

  if (!Number.isFinite(parsed)) {
    throw new ProbeFieldError(key, value);
  }
  return parsed;
}

/** Reads an integer; floats are truncated, a missing value reads as 0. */
export function readInteger(section: ProbeSection, key: string): number {
  const value = section[key];
  if (isAbsent(value)) {
    return 0;
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    return parseInt(value.trim(), 10);
  }
  throw new ProbeFieldError(key, value);
}

/** Rounds ties to the even neighbour: 0.125 -> 0.12, 0.375 -> 0.38. */
export function roundHalfEven(value: number, digits: number): number {
  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;

  if (fraction > 0.5) {
    return (floor + 1) / factor;
  }
  if (fraction < 0.5) {
    return floor / factor;
  }
  return (floor % 2 === 0 ? floor : floor + 1) / factor;
}

/**
 * Converts a "num/den" frame rate expression such as "30000/1001" to frames
 * per second, rounded to 2 decimals. Anything that is not two integers with a
 * nonzero denominator yields 0.
 */
export function parseFrameRate(expression: unknown): number {
  const text = typeof expression === 'string' ? expression : '0/1';
  const parts = text.split('/').map((part) => part.trim());
  if (parts.length !== 2 || !parts.every((part) => INTEGER_PATTERN.test(part))) {
    return 0;
  }

  const numerator = parseInt(parts[0], 10);
  const denominator = parseInt(parts[1], 10);
  if (denominator === 0) {
    return 0;
  }
  return roundHalfEven(numerator / denominator, 2);
}
