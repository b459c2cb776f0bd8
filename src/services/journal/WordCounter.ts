// MARK: - Word Counter
// Pure word counting for journal messages

/**
 * Counts whitespace-separated words. Empty or whitespace-only text is 0.
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return 0;
  }

  return trimmed.split(/\s+/u).length;
}
