/**
 * Shared helpers for the specs, not part of the library.
 */

/**
 * Hex digits to bytes, whitespace between them is ignored
 */
export function hexToBytes (s: string): Uint8Array {
  const clean = s.replace(/\s+/g, '');
  const len = clean.length >> 1;
  const arr = new Uint8Array(len);
  for (let i = 0; i < len; i++) {
    arr[i] = parseInt(clean.substring(i * 2, i * 2 + 2), 16);
  }
  return arr;
}

/**
 * @returns what `fn` throws, fails when it returns normally
 */
export function catchError (fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected an error');
}
