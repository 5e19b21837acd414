/**
 * Character handling for the index
 *
 * A character is one Unicode code point. The sentinel always sorts below
 * every other character, whatever its own code point is, so any character
 * may serve as the terminator as long as the text does not contain it.
 */

/**
 * Split a string into code points
 */
export function splitChars(text: string): string[] {
  return Array.from(text);
}

/**
 * Sort key for one character: 0 for the sentinel, code point + 1 otherwise
 */
export function sortKey(char: string, sentinel: string): number {
  if (char === sentinel) {
    return 0;
  }
  return (char.codePointAt(0) ?? 0) + 1;
}

/**
 * Map a character sequence to its sort keys
 */
export function encodeText(chars: readonly string[], sentinel: string): Uint32Array {
  const keys = new Uint32Array(chars.length);
  for (let i = 0; i < chars.length; i++) {
    keys[i] = sortKey(chars[i] ?? "", sentinel);
  }
  return keys;
}

/**
 * Comparator ordering characters the way the suffix ordering does
 */
export function compareSymbols(a: string, b: string, sentinel: string): number {
  return sortKey(a, sentinel) - sortKey(b, sentinel);
}
