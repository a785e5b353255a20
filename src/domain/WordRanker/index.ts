const ZERO = 0;
const ONE = 1;

export interface ScoredWord {
  readonly word: string;
  readonly score: number;
}

function countCharacters(words: readonly string[]): {
  readonly counts: ReadonlyMap<string, number>;
  readonly total: number;
} {
  const counts = new Map<string, number>();
  let total = ZERO;

  for (const word of words) {
    for (const letter of word) {
      counts.set(letter, (counts.get(letter) ?? ZERO) + ONE);
      total += ONE;
    }
  }

  return { counts, total };
}

/**
 * Scores each word by summing the corpus-wide relative frequency of its
 * characters. Repeated characters contribute once per occurrence.
 */
export function scoreWords(words: readonly string[]): readonly ScoredWord[] {
  const { counts, total } = countCharacters(words);

  return words.map((word) => {
    if (total === ZERO) {
      return { word, score: ZERO };
    }

    // Summing integer counts before dividing keeps anagram scores exactly equal.
    let occurrenceSum = ZERO;
    for (const letter of word) {
      occurrenceSum += counts.get(letter) ?? ZERO;
    }

    return { word, score: occurrenceSum / total };
  });
}

/** Descending by score; equal scores keep their input order. */
export function rankWords(words: readonly string[]): readonly string[] {
  return scoreWords(words)
    .map((scored, index) => ({ ...scored, index }))
    .sort((first, second) => {
      if (first.score !== second.score) {
        return second.score - first.score;
      }

      return first.index - second.index;
    })
    .map((scored) => scored.word);
}
