/**
 * Table-Driven Agent — History-based decision strategy.
 *
 * Implements IDecisionCore by exact lookup:
 *   - Every percept is appended to the agent's PerceptLog
 *   - The whole log is the key into a pre-built DecisionTable
 *   - A miss is reported as NO_MATCHING_HISTORY, never replaced by a default
 *
 * The log grows by one entry per call, so a table holding only length-1
 * keys can answer at most the first call.
 */

import type { IDecisionCore, DecisionResult } from "../interface.js";
import { decided, declined } from "../interface.js";
import { DecisionError } from "../../errors/DecisionError.js";
import { PerceptLog } from "../../perception/log.js";
import type { PerceptSequence } from "../../perception/interface.js";
import type { DecisionTable } from "./decisionTable.js";

/**
 * Look up `log` extended by `percept` in `table`, then append `percept`.
 * The lookup runs first so a throwing custom PerceptKey leaves the log
 * untouched. The table is never modified.
 */
export function resolveFromTable<P, A>(
    log: PerceptLog<P>,
    table: DecisionTable<P, A>,
    percept: P,
): DecisionResult<A> {
    const sequence = [...log.asSequence(), percept];
    const entry = table.find(sequence);
    log.append(percept);
    if (!entry.found) {
        return declined(DecisionError.noMatchingHistory(sequence.length));
    }
    return decided(entry.action);
}

export class TableDrivenAgent<P, A> implements IDecisionCore<P, A> {
    private readonly log = new PerceptLog<P>();
    private readonly table: DecisionTable<P, A>;

    constructor(table: DecisionTable<P, A>) {
        this.table = table;
    }

    advance(percept: P): DecisionResult<A> {
        return resolveFromTable(this.log, this.table, percept);
    }

    /** Every percept received so far, oldest first */
    get history(): PerceptSequence<P> {
        return this.log.asSequence();
    }
}
