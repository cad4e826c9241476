/**
 * Shannon entropy (bits) of the character distribution of `text`, counting
 * Unicode code points so that non-ASCII network names are not inflated by
 * their UTF-16 encoding.
 */
export function ssidEntropy(text: string): number {
  if (!text) {
    return 0;
  }

  const counts = new Map<string, number>();
  let length = 0;
  for (const symbol of text) {
    counts.set(symbol, (counts.get(symbol) ?? 0) + 1);
    length += 1;
  }

  let entropy = 0;
  for (const count of counts.values()) {
    const probability = count / length;
    entropy -= probability * Math.log2(probability);
  }
  // A single repeated symbol yields -0.
  return entropy > 0 ? entropy : 0;
}
