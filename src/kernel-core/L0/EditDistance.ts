// src/kernel-core/L0/EditDistance.ts

/**
 * Levenshtein distance: insertion, deletion and substitution each cost 1.
 */
export function editDistance(a: string, b: string): number {
    if (a === b) return 0;
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    // Two-row DP table
    let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
    let curr = new Array<number>(b.length + 1).fill(0);

    for (let i = 1; i <= a.length; i++) {
        curr[0] = i;
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            curr[j] = Math.min(
                (prev[j] ?? 0) + 1,
                (curr[j - 1] ?? 0) + 1,
                (prev[j - 1] ?? 0) + cost
            );
        }
        [prev, curr] = [curr, prev];
    }
    return prev[b.length] ?? 0;
}

/**
 * Candidate with the smallest distance to `target`; the first one wins ties.
 * Undefined when there are no candidates.
 */
export function closestMatch(target: string, candidates: Iterable<string>): string | undefined {
    let best: string | undefined;
    let bestDistance = Number.POSITIVE_INFINITY;

    for (const candidate of candidates) {
        const d = editDistance(target, candidate);
        if (d < bestDistance) {
            best = candidate;
            bestDistance = d;
        }
    }
    return best;
}
