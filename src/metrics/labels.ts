export const METHOD_LABEL_MAX_LENGTH = 16;
export const PATH_LABEL_MAX_LENGTH = 160;

const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/g;

export type CleanLabelOptions = {
  fallback?: string;
  maxLength?: number;
};

/**
 * Normalizes a value for use as a metric label: control characters become
 * spaces, surrounding whitespace is trimmed, empty values take the fallback and
 * long values are cut with a trailing `...`.
 */
export function cleanLabel(value: unknown, options: CleanLabelOptions = {}): string {
  const fallback = options.fallback ?? 'unknown';
  const maxLength = Math.max(4, options.maxLength ?? PATH_LABEL_MAX_LENGTH);
  const raw = typeof value === 'string' ? value : value === null || value === undefined ? '' : String(value);
  let text = raw.replace(CONTROL_CHARACTERS, ' ').trim();
  if (!text) {
    text = fallback;
  }
  // lengths count code points so a surrogate pair is never split
  const codePoints = Array.from(text);
  if (codePoints.length > maxLength) {
    text = `${codePoints.slice(0, maxLength - 3).join('')}...`;
  }
  return text;
}

export function methodLabel(method: unknown): string {
  const raw = typeof method === 'string' ? method.toUpperCase() : '';
  return cleanLabel(raw, { fallback: 'UNKNOWN', maxLength: METHOD_LABEL_MAX_LENGTH });
}

export function pathLabel(path: unknown): string {
  return cleanLabel(path, { fallback: '/', maxLength: PATH_LABEL_MAX_LENGTH });
}

export function parseStatusCode(statusCode: unknown): number | null {
  const parsed =
    typeof statusCode === 'number'
      ? statusCode
      : typeof statusCode === 'string' && statusCode.trim().length > 0
        ? Number(statusCode.trim())
        : Number.NaN;
  return Number.isFinite(parsed) ? Math.trunc(parsed) : null;
}

export function statusClass(statusCode: unknown): string {
  const code = parseStatusCode(statusCode);
  if (code === null || code < 100) {
    return '0xx';
  }
  return `${Math.floor(code / 100)}xx`;
}

export function nonNegativeNumber(value: unknown): number {
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : Number.NaN;
  if (!Number.isFinite(parsed) || parsed < 0) {
    return 0;
  }
  return parsed;
}

export function nonNegativeCount(value: unknown): number {
  return Math.trunc(nonNegativeNumber(value));
}
