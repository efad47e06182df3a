/**
 * Cuts text into consecutive slices of at most `limit` code points. A
 * surrogate pair never straddles two chunks.
 */
export const splitText = (text: string, limit: number): string[] => {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Chunk limit must be a positive integer, got ${limit}`);
  }
  const chars = Array.from(text);
  const chunks: string[] = [];
  for (let start = 0; start < chars.length; start += limit) {
    chunks.push(chars.slice(start, start + limit).join(""));
  }
  return chunks;
};
