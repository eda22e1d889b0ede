function toAsciiLowerCase(value: string): string {
  return value.replace(/[A-Z]/g, (char) => char.toLowerCase());
}

export function replaceLiteral(haystack: string, needle: string, replacement: string): string {
  if (needle.length === 0) {
    return haystack;
  }
  return haystack.split(needle).join(replacement);
}

/**
 * Replaces every ASCII-case-insensitive occurrence of `needle`. Only the
 * comparison ignores case: text outside the matches keeps its original casing.
 * ASCII folding keeps offsets into the folded copy valid for the original.
 */
export function replaceCaseInsensitive(haystack: string, needle: string, replacement: string): string {
  if (needle.length === 0) {
    return haystack;
  }

  const foldedHaystack = toAsciiLowerCase(haystack);
  const foldedNeedle = toAsciiLowerCase(needle);
  let result = '';
  let cursor = 0;
  let match = foldedHaystack.indexOf(foldedNeedle);

  while (match !== -1) {
    result += haystack.slice(cursor, match) + replacement;
    cursor = match + foldedNeedle.length;
    match = foldedHaystack.indexOf(foldedNeedle, cursor);
  }

  return result + haystack.slice(cursor);
}
