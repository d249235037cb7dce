export const DEFAULT_DESTRUCTIVE_TERMS: readonly string[] = ['delete', 'remove', 'kill', 'uninstall', 'erase'];

export type DestructiveClassifier = (recommendation: string) => boolean;

// Splits on anything that is not a letter or digit, so "Delete." and "kill,"
// both count. Inflections ("deleting", "removal") do not match; that gap is a
// known false-negative risk of a fixed vocabulary.
export function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean));
}

export function createClassifier(terms: Iterable<string> = DEFAULT_DESTRUCTIVE_TERMS): DestructiveClassifier {
  const vocabulary = new Set(Array.from(terms, term => term.trim().toLowerCase()).filter(Boolean));

  return (recommendation: string): boolean => {
    if (typeof recommendation !== 'string' || recommendation.length === 0) return false;

    for (const token of tokenize(recommendation)) {
      if (vocabulary.has(token)) return true;
    }
    return false;
  };
}

export const isDestructive: DestructiveClassifier = createClassifier();
