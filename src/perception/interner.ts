/**
 * PerceptInterner — Numbers each distinct percept once.
 *
 * Distinctness is SameValueZero, the equality Map uses, so no two
 * different percepts share an id and nothing needs to be serialized.
 */

export class PerceptInterner<P> {
    private readonly ids = new Map<P, number>();

    /** Id of `percept`, assigning the next one if it is new */
    intern(percept: P): number {
        const existing = this.ids.get(percept);
        if (existing !== undefined) return existing;
        const id = this.ids.size;
        this.ids.set(percept, id);
        return id;
    }

    /** Id of `percept` if it was ever interned */
    idOf(percept: P): number | undefined {
        return this.ids.get(percept);
    }

    get size(): number {
        return this.ids.size;
    }
}
