const TRUE_STRINGS: ReadonlySet<string> = new Set(['1', 't', 'true', 'True', 'TRUE']);
const FALSE_STRINGS: ReadonlySet<string> = new Set(['0', 'f', 'false', 'False', 'FALSE']);

/** Parse a boolean-like string (`1/0`, `t/f`, `true/false` in the usual casings). Returns `undefined` for anything else. */
export function parseBooleanLike(value: string): boolean | undefined {
  if (TRUE_STRINGS.has(value)) return true;
  if (FALSE_STRINGS.has(value)) return false;
  return undefined;
}

const NAIVE_SPACED = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2}(?:\.\d+)?)$/;
const OFFSET_SPACED = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2}(?:\.\d+)?)([+-]\d{2})(?::?(\d{2}))?$/;
const NAIVE_ISO = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?$/;
const OFFSET_ISO_SHORT = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?)([+-]\d{2})(?::?(\d{2}))?$/;
const CANONICAL = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/;

/** Which timestamp shape a string was recognised as. */
export type TimestampShape = 'naive-spaced' | 'naive-iso' | 'offset-unpadded';

export interface TimestampRewrite {
  readonly value: string;
  readonly shape: TimestampShape;
}

/** Whether the string is already a timezone-qualified ISO timestamp. */
export function isCanonicalTimestamp(value: string): boolean {
  return CANONICAL.test(value);
}

/**
 * Rewrite a timestamp-like string into `YYYY-MM-DDTHH:MM:SS[.f](Z|±HH:MM)`.
 *
 * Naive values are taken to be UTC. Returns `undefined` when the value is
 * already canonical or does not look like a timestamp at all.
 */
export function canonicalizeTimestamp(value: string): TimestampRewrite | undefined {
  if (CANONICAL.test(value)) return undefined;

  const naiveSpaced = NAIVE_SPACED.exec(value);
  if (naiveSpaced) {
    return { value: `${naiveSpaced[1] ?? ''}T${naiveSpaced[2] ?? ''}Z`, shape: 'naive-spaced' };
  }

  if (NAIVE_ISO.test(value)) {
    return { value: `${value}Z`, shape: 'naive-iso' };
  }

  const offsetSpaced = OFFSET_SPACED.exec(value);
  if (offsetSpaced) {
    const [, date = '', time = '', hours = '', minutes = '00'] = offsetSpaced;
    return { value: `${date}T${time}${hours}:${minutes}`, shape: 'offset-unpadded' };
  }

  const offsetIso = OFFSET_ISO_SHORT.exec(value);
  if (offsetIso) {
    const [, dateTime = '', hours = '', minutes = '00'] = offsetIso;
    return { value: `${dateTime}${hours}:${minutes}`, shape: 'offset-unpadded' };
  }

  return undefined;
}
