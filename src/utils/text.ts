/**
 * Keeps the first `length` characters, counting by code point so a
 * surrogate pair is never split
 */
export function truncateChars(text: string, length: number): string {
  return Array.from(text).slice(0, length).join('');
}
