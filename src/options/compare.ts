const UPPER_A = 0x41;
const UPPER_Z = 0x5a;
const CASE_OFFSET = 0x20;

function foldCode(code: number): number {
  return code >= UPPER_A && code <= UPPER_Z ? code + CASE_OFFSET : code;
}

/**
 * Lowercase ASCII letters only. Everything else, including non-ASCII text,
 * passes through untouched so results never depend on the host locale.
 */
export function foldAsciiCase(text: string): string {
  return text.replace(/[A-Z]/g, (ch) => String.fromCharCode(ch.charCodeAt(0) + CASE_OFFSET));
}

/**
 * Ordinal comparison after ASCII case folding. A strict prefix sorts first.
 */
export function compareCaseInsensitive(a: string, b: string): -1 | 0 | 1 {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = foldCode(a.charCodeAt(i));
    const right = foldCode(b.charCodeAt(i));
    if (left !== right) {
      return left < right ? -1 : 1;
    }
  }
  if (a.length === b.length) {
    return 0;
  }
  return a.length < b.length ? -1 : 1;
}

export function equalsCaseInsensitive(a: string, b: string): boolean {
  return compareCaseInsensitive(a, b) === 0;
}
