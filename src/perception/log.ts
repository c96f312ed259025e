/**
 * PerceptLog — Append-only record of every percept an agent has observed.
 *
 * Growth is linear in the number of percepts and never bounded here: the
 * table strategy needs the full history for its lookup key.
 */

import type { PerceptSequence } from "./interface.js";

export class PerceptLog<P> {
    private readonly percepts: P[] = [];

    append(percept: P): void {
        this.percepts.push(percept);
    }

    /** Snapshot of the current contents, oldest first */
    asSequence(): PerceptSequence<P> {
        return this.percepts.slice();
    }

    get length(): number {
        return this.percepts.length;
    }
}
