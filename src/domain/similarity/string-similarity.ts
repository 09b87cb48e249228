/**
 * String-similarity capability.
 *
 * The engine only needs a normalized `ratio` in [0, 1]; everything else
 * (partial, token-sort, token-set) is derived from it by `FuzzyMatcher`.
 * The default backend is the pure indel ratio below; an enhanced backend
 * can be injected through configuration.
 */
export interface StringSimilarity {
  readonly name: string;
  ratio(a: string, b: string): number;
}

function longestCommonSubsequence(a: readonly string[], b: readonly string[]): number {
  if (a.length === 0 || b.length === 0) return 0;
  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      current[j] = a[i - 1] === b[j - 1]
        ? (previous[j - 1] ?? 0) + 1
        : Math.max(previous[j] ?? 0, current[j - 1] ?? 0);
    }
    [previous, current] = [current, previous];
  }
  return previous[b.length] ?? 0;
}

/**
 * Edit-distance ratio with insertions and deletions only:
 * `(|a| + |b| − distance) / (|a| + |b|)`, i.e. `2·LCS / (|a| + |b|)`.
 * Operates on code points.
 */
export const indelSimilarity: StringSimilarity = {
  name: 'indel',
  ratio(a: string, b: string): number {
    if (a === b) return 1;
    const left = [...a];
    const right = [...b];
    const total = left.length + right.length;
    if (left.length === 0 || right.length === 0) return 0;
    return (2 * longestCommonSubsequence(left, right)) / total;
  },
};

export interface FuzzyMatcher {
  ratio(a: string, b: string): number;
  /** Best ratio of the shorter string against any same-length window of the longer. */
  partialRatio(a: string, b: string): number;
  tokenSortRatio(a: string, b: string): number;
  tokenSetRatio(a: string, b: string): number;
}

function tokens(text: string): string[] {
  return text.split(/\s+/).filter((t) => t !== '');
}

export function createFuzzyMatcher(backend: StringSimilarity = indelSimilarity): FuzzyMatcher {
  const ratio = (a: string, b: string): number => {
    if (a === b) return 1;
    if (a === '' || b === '') return 0;
    return backend.ratio(a, b);
  };

  return {
    ratio,

    partialRatio(a, b) {
      const [shorter, longer] = [...a].length <= [...b].length ? [[...a], [...b]] : [[...b], [...a]];
      if (shorter.length === 0) return 0;
      const needle = shorter.join('');
      let best = 0;
      for (let start = 0; start + shorter.length <= longer.length; start++) {
        best = Math.max(best, ratio(needle, longer.slice(start, start + shorter.length).join('')));
        if (best === 1) break;
      }
      return best;
    },

    tokenSortRatio(a, b) {
      return ratio(tokens(a).sort().join(' '), tokens(b).sort().join(' '));
    },

    tokenSetRatio(a, b) {
      const left = new Set(tokens(a));
      const right = new Set(tokens(b));
      const shared = [...left].filter((t) => right.has(t)).sort().join(' ');
      const onlyLeft = [...left].filter((t) => !right.has(t)).sort().join(' ');
      const onlyRight = [...right].filter((t) => !left.has(t)).sort().join(' ');
      const combinedLeft = `${shared} ${onlyLeft}`.trim();
      const combinedRight = `${shared} ${onlyRight}`.trim();

      return Math.max(
        ratio(shared, combinedLeft),
        ratio(shared, combinedRight),
        ratio(combinedLeft, combinedRight),
      );
    },
  };
}
