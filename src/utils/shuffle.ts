/**
 * Fisher–Yates shuffle. Returns a new array; the input is left untouched.
 * `random` must return values in [0, 1).
 */
export function shuffleArray<T>(
    items: readonly T[],
    random: () => number = Math.random
): T[] {
    const result = items.slice();
    for (let i = result.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        const held = result[i];
        result[i] = result[j];
        result[j] = held;
    }
    return result;
}
