export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function countWords(value: string): number {
  const trimmed = value.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function hasLetters(value: string): boolean {
  return /\p{L}/u.test(value);
}

/** True when every cased letter is uppercase and at least one letter exists. */
export function isAllCaps(value: string): boolean {
  return hasLetters(value) && value === value.toUpperCase() && value !== value.toLowerCase();
}

export function toTitleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[\s\-/(&])(\p{L})/gu, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}
