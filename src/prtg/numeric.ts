const NUMERIC_PREFIX_RE = /^[0-9.,+-]+/;
const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses the numeric prefix of a PRTG formatted value such as `"12.5 kWh"`,
 * `"1,234.5 MB"` or `"12,5 %"`.
 *
 * A comma without a dot is read as a decimal separator; a comma next to a dot
 * is read as a thousands separator. Returns `null` when no number is found.
 */
export function parseNumber(text: string | null | undefined): number | null {
  if (typeof text !== 'string') {
    return null;
  }

  const trimmed = text.trim();
  if (!trimmed) {
    return null;
  }

  const match = NUMERIC_PREFIX_RE.exec(trimmed);
  if (!match) {
    return null;
  }

  let candidate = match[0];
  const hasComma = candidate.includes(',');
  const hasDot = candidate.includes('.');
  if (hasComma && !hasDot) {
    candidate = candidate.replace(/,/g, '.');
  } else if (hasComma && hasDot) {
    candidate = candidate.replace(/,/g, '');
  }

  const value = Number(candidate);
  return Number.isFinite(value) ? value : null;
}

/**
 * Converts a typed `lastvalue_raw` cell. Numbers pass through, plain decimal
 * strings are converted, anything else (hex or binary literals included)
 * yields `null`.
 */
export function toRawNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!DECIMAL_RE.test(trimmed)) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function firstNumber(...candidates: Array<() => number | null>): number | null {
  for (const candidate of candidates) {
    const value = candidate();
    if (value !== null) {
      return value;
    }
  }
  return null;
}
