/**
 * Interpretation — Total mapping from one percept to an internal state.
 *
 * Every percept maps to either a recognized state or the unrecognized
 * variant, which keeps the original percept. There is no third outcome,
 * so an interpretation function cannot leave a case undefined.
 */

import { sameValueZero, type PerceptKey } from "../../perception/interface.js";

export type Interpretation<S, P> =
    | { kind: "recognized"; state: S }
    | { kind: "unrecognized"; percept: P };

export type InterpretInput<P, S> = (percept: P) => Interpretation<S, P>;

export function recognized<S>(state: S): { kind: "recognized"; state: S } {
    return { kind: "recognized", state };
}

export function unrecognized<P>(percept: P): { kind: "unrecognized"; percept: P } {
    return { kind: "unrecognized", percept };
}

/** The percept is its own state */
export function recognizeAll<P>(percept: P): Interpretation<P, P> {
    return recognized(percept);
}

/**
 * Two interpretations are equal when both are recognized with equal states,
 * or both are unrecognized carrying equal percepts. Equality is
 * SameValueZero unless a key function is given.
 */
export function sameInterpretation<S, P>(
    a: Interpretation<S, P>,
    b: Interpretation<S, P>,
    opts?: { stateKey?: (state: S) => string; perceptKey?: PerceptKey<P> },
): boolean {
    if (a.kind === "recognized" && b.kind === "recognized") {
        const stateKey = opts?.stateKey;
        return stateKey ? stateKey(a.state) === stateKey(b.state) : sameValueZero(a.state, b.state);
    }
    if (a.kind === "unrecognized" && b.kind === "unrecognized") {
        const perceptKey = opts?.perceptKey;
        return perceptKey
            ? perceptKey(a.percept) === perceptKey(b.percept)
            : sameValueZero(a.percept, b.percept);
    }
    return false;
}
