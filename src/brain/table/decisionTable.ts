/**
 * DecisionTable — Static mapping from exact percept sequences to actions.
 *
 * Built once by a bootstrap collaborator, then read-only: there is no
 * insertion method, and lookups never extend the table. Keys are whole
 * sequences compared element by element; no prefix or fuzzy matching.
 */

import { TableConfigError } from "../../errors/DecisionError.js";
import { sequenceKey, type PerceptKey, type PerceptSequence } from "../../perception/interface.js";
import { PerceptInterner } from "../../perception/interner.js";

// ═══════════════════════════════════════════════════════
//                     Table Entries
// ═══════════════════════════════════════════════════════

export interface TableEntry<P, A> {
    percepts: PerceptSequence<P>;
    action: A;
}

export type TableLookup<A> =
    | { found: true; action: A }
    | { found: false };

export interface DecisionTableOptions<P> {
    /**
     * Percept identity used to build sequence keys. Default: SameValueZero
     * (primitives by value, objects by reference)
     */
    keyOf?: PerceptKey<P>;
}

// ═══════════════════════════════════════════════════════
//                     Decision Table
// ═══════════════════════════════════════════════════════

export class DecisionTable<P, A> {
    private readonly actions = new Map<string, { action: A }>();
    private readonly keyOf?: PerceptKey<P>;
    private readonly interner = new PerceptInterner<P>();
    /** Longest sequence with an entry */
    readonly horizon: number;

    constructor(entries: Iterable<TableEntry<P, A>>, opts?: DecisionTableOptions<P>) {
        this.keyOf = opts?.keyOf;
        let horizon = 0;
        for (const entry of entries) {
            if (entry.percepts.length === 0) {
                throw new TableConfigError("Table entries need at least one percept");
            }
            const key = this.entryKey(entry.percepts);
            if (this.actions.has(key)) {
                throw new TableConfigError(
                    `Duplicate table entry for sequence #${this.actions.size} (length ${entry.percepts.length})`,
                );
            }
            this.actions.set(key, { action: entry.action });
            horizon = Math.max(horizon, entry.percepts.length);
        }
        this.horizon = horizon;
    }

    get size(): number {
        return this.actions.size;
    }

    /** Entry for exactly this sequence */
    find(sequence: PerceptSequence<P>): TableLookup<A> {
        const slot = this.slotFor(sequence);
        return slot ? { found: true, action: slot.action } : { found: false };
    }

    /** Action for exactly this sequence, or undefined */
    lookup(sequence: PerceptSequence<P>): A | undefined {
        return this.slotFor(sequence)?.action;
    }

    has(sequence: PerceptSequence<P>): boolean {
        return this.slotFor(sequence) !== undefined;
    }

    private entryKey(sequence: PerceptSequence<P>): string {
        if (this.keyOf) return sequenceKey(sequence, this.keyOf);
        return sequence.map((p) => this.interner.intern(p)).join(",");
    }

    /** Never interns: a percept the table has not seen cannot be part of a key */
    private slotFor(sequence: PerceptSequence<P>): { action: A } | undefined {
        if (this.keyOf) return this.actions.get(sequenceKey(sequence, this.keyOf));
        const ids: number[] = [];
        for (const percept of sequence) {
            const id = this.interner.idOf(percept);
            if (id === undefined) return undefined;
            ids.push(id);
        }
        return this.actions.get(ids.join(","));
    }
}

// ═══════════════════════════════════════════════════════
//                 Bounded Table Construction
// ═══════════════════════════════════════════════════════

/**
 * Number of entries a complete table needs for every sequence of length
 * 1..horizon over an alphabet of `alphabetSize` percepts:
 * sum over t of alphabetSize^t.
 */
export function tableSizeForHorizon(alphabetSize: number, horizon: number): number {
    if (!Number.isInteger(alphabetSize) || alphabetSize < 0) {
        throw new RangeError(`alphabetSize must be a non-negative integer, got ${alphabetSize}`);
    }
    if (!Number.isInteger(horizon) || horizon < 0) {
        throw new RangeError(`horizon must be a non-negative integer, got ${horizon}`);
    }
    let total = 0;
    let level = 1;
    for (let t = 1; t <= horizon; t++) {
        level *= alphabetSize;
        total += level;
        if (total > Number.MAX_SAFE_INTEGER) {
            throw new RangeError(
                `A complete table over ${alphabetSize} percepts to horizon ${horizon} exceeds ${Number.MAX_SAFE_INTEGER} entries`,
            );
        }
    }
    return total;
}

/** Policy deciding the action for a full sequence; undefined leaves it out */
export type SequencePolicy<P, A> = (sequence: PerceptSequence<P>) => A | undefined;

/**
 * Enumerate every sequence up to `horizon` over `alphabet` and ask `policy`
 * for its action. The caller chooses the horizon; the table grows as
 * tableSizeForHorizon(alphabet.length, horizon).
 */
export function enumerateTable<P, A>(
    alphabet: readonly P[],
    horizon: number,
    policy: SequencePolicy<P, A>,
    opts?: DecisionTableOptions<P>,
): DecisionTable<P, A> {
    // Validates horizon as a side effect
    tableSizeForHorizon(alphabet.length, horizon);

    const entries: TableEntry<P, A>[] = [];
    let frontier: P[][] = [[]];
    for (let t = 1; t <= horizon; t++) {
        const next: P[][] = [];
        for (const prefix of frontier) {
            for (const percept of alphabet) {
                const sequence = [...prefix, percept];
                next.push(sequence);
                const action = policy(sequence);
                if (action !== undefined) {
                    entries.push({ percepts: sequence, action });
                }
            }
        }
        frontier = next;
    }
    return new DecisionTable(entries, opts);
}
