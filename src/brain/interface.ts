/**
 * IDecisionCore — The decision contract every agent strategy implements.
 *
 * Takes the next percept → produces a DecisionResult.
 * Two implementation families:
 *   - TableDrivenAgent: exact lookup of the full percept history
 *   - SimpleReflexAgent: stateless interpret + rule match on one percept
 */

import type { DecisionError } from "../errors/DecisionError.js";

// ═══════════════════════════════════════════════════════
//                    Decision Output
// ═══════════════════════════════════════════════════════

export type DecisionResult<A> =
    | { ok: true; action: A }
    | { ok: false; error: DecisionError };

export function decided<A>(action: A): DecisionResult<A> {
    return { ok: true, action };
}

export function declined<A>(error: DecisionError): DecisionResult<A> {
    return { ok: false, error };
}

// ═══════════════════════════════════════════════════════
//                  IDecisionCore Interface
// ═══════════════════════════════════════════════════════

export interface IDecisionCore<P, A> {
    /**
     * Resolve the action for the next percept.
     *
     * Called once per percept, in receipt order, by a single driver.
     * Never throws for a missing decision; the failure kind is returned.
     */
    advance(percept: P): DecisionResult<A>;
}
