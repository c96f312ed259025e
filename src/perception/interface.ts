/**
 * Percepts — Sensory input for the decision core.
 *
 * A percept is an opaque value supplied by the environment. By default two
 * percepts are the same when they are SameValueZero-equal: primitives
 * (including symbols, bigints and NaN) by value, objects by reference.
 * Callers wanting structural identity pass a PerceptKey.
 * Pure data — no side effects.
 */

// ═══════════════════════════════════════════════════════
//                    Percept Identity
// ═══════════════════════════════════════════════════════

/** Stable identity of a percept; equal percepts must produce equal keys */
export type PerceptKey<P> = (percept: P) => string;

/** Ordered percepts, oldest first */
export type PerceptSequence<P> = readonly P[];

/** Equality used by Map and Set: like ===, except NaN equals NaN */
export function sameValueZero(a: unknown, b: unknown): boolean {
    return a === b || (a !== a && b !== b);
}

/**
 * Opt-in structural identity: JSON encoding. Only lossless for strings,
 * finite numbers, booleans and plain data with a fixed property order.
 */
export function jsonPerceptKey<P>(percept: P): string {
    return JSON.stringify(percept) ?? "undefined";
}

/** Lookup key of a whole sequence under a PerceptKey: the JSON array of its element keys */
export function sequenceKey<P>(sequence: PerceptSequence<P>, keyOf: PerceptKey<P>): string {
    return JSON.stringify(sequence.map((p) => keyOf(p)));
}

/** Equal length and pairwise-equal percepts, in order */
export function sequencesEqual<P>(
    a: PerceptSequence<P>,
    b: PerceptSequence<P>,
    keyOf?: PerceptKey<P>,
): boolean {
    if (a.length !== b.length) return false;
    return keyOf
        ? a.every((p, i) => keyOf(p) === keyOf(b[i]))
        : a.every((p, i) => sameValueZero(p, b[i]));
}
