/**
 * Simple Reflex Agent — Stateless decision strategy.
 *
 * Implements IDecisionCore by composing two caller-supplied functions:
 *   - interpret: percept → Interpretation (total, never fails)
 *   - matchRule: Interpretation → DecisionResult (may decline)
 *
 * No percept history is kept; the same percept under the same
 * configuration always yields the same result.
 */

import type { IDecisionCore, DecisionResult } from "../interface.js";
import { decided, declined } from "../interface.js";
import { DecisionError } from "../../errors/DecisionError.js";
import type { Interpretation, InterpretInput } from "./interpretation.js";

export type RuleMatch<S, P, A> = (interpretation: Interpretation<S, P>) => DecisionResult<A>;

/** Rule over recognized states only; undefined means no rule applies */
export type StateRules<S, A> = (state: S) => A | undefined;

/** Interpret one percept and match it against the rules. */
export function resolveReflex<P, S, A>(
    percept: P,
    interpret: InterpretInput<P, S>,
    matchRule: RuleMatch<S, P, A>,
): DecisionResult<A> {
    return matchRule(interpret(percept));
}

/**
 * Build a matchRule from rules over recognized states. The unrecognized
 * variant, and states the rules leave undefined, decline with
 * NO_APPLICABLE_RULE.
 */
export function rejectUnrecognized<S, P, A>(rules: StateRules<S, A>): RuleMatch<S, P, A> {
    return (interpretation) => {
        if (interpretation.kind === "unrecognized") {
            return declined(
                DecisionError.noApplicableRule(
                    interpretation.percept,
                    "Percept was not recognized by the interpretation step",
                ),
            );
        }
        const action = rules(interpretation.state);
        if (action === undefined) {
            return declined(DecisionError.noApplicableRule());
        }
        return decided(action);
    };
}

/**
 * Explicit fallback policy: replace NO_APPLICABLE_RULE with `fallback`.
 * Other failures pass through unchanged.
 */
export function withFallback<S, P, A>(matchRule: RuleMatch<S, P, A>, fallback: A): RuleMatch<S, P, A> {
    return (interpretation) => {
        const result = matchRule(interpretation);
        if (!result.ok && result.error.code === "NO_APPLICABLE_RULE") {
            return decided(fallback);
        }
        return result;
    };
}

export class SimpleReflexAgent<P, S, A> implements IDecisionCore<P, A> {
    private readonly interpret: InterpretInput<P, S>;
    private readonly matchRule: RuleMatch<S, P, A>;

    constructor(interpret: InterpretInput<P, S>, matchRule: RuleMatch<S, P, A>) {
        this.interpret = interpret;
        this.matchRule = matchRule;
    }

    advance(percept: P): DecisionResult<A> {
        return resolveReflex(percept, this.interpret, this.matchRule);
    }
}
