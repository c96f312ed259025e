/**
 * DecisionError — Typed failure returned by every decision strategy.
 *
 * Carries structured failure metadata:
 * - code: which resolution step declined (NO_MATCHING_HISTORY | NO_APPLICABLE_RULE)
 * - strategy: the resolver that produced it (table | reflex)
 * - recoverable: always true; the core never treats its own failures as fatal
 * - operatorMessage: sanitized string safe for an operator-facing signal
 *
 * Instances are returned inside a DecisionResult, not thrown.
 */

import { describeForOperator } from "../errors.js";

export const DECISION_ERROR_CODES = ["NO_MATCHING_HISTORY", "NO_APPLICABLE_RULE"] as const;

export type DecisionErrorCode = (typeof DECISION_ERROR_CODES)[number];

export type DecisionStrategy = "table" | "reflex";

export function isDecisionErrorCode(value: string): value is DecisionErrorCode {
    return DECISION_ERROR_CODES.some((code) => code === value);
}

export class DecisionError<P = unknown> extends Error {
    readonly code: DecisionErrorCode;
    readonly strategy: DecisionStrategy;
    readonly recoverable = true;
    readonly operatorMessage: string;
    /** Length of the percept sequence that missed the table (table strategy) */
    readonly sequenceLength?: number;
    /** The percept the reflex rules declined, when known */
    readonly percept?: P;

    constructor(
        message: string,
        opts: {
            code: DecisionErrorCode;
            strategy: DecisionStrategy;
            sequenceLength?: number;
            percept?: P;
            cause?: unknown;
        },
    ) {
        super(message, { cause: opts.cause });
        this.name = "DecisionError";
        this.code = opts.code;
        this.strategy = opts.strategy;
        this.sequenceLength = opts.sequenceLength;
        this.percept = opts.percept;
        this.operatorMessage = describeForOperator(opts.code);
    }

    /** Table strategy found no entry for the exact accumulated sequence */
    static noMatchingHistory(sequenceLength: number): DecisionError<never> {
        return new DecisionError<never>(
            `No table entry for percept sequence of length ${sequenceLength}`,
            { code: "NO_MATCHING_HISTORY", strategy: "table", sequenceLength },
        );
    }

    /** Reflex rule matching declined to act on the interpreted state */
    static noApplicableRule<P>(percept?: P, reason?: string): DecisionError<P> {
        return new DecisionError<P>(
            reason ?? "No rule applies to the interpreted state",
            { code: "NO_APPLICABLE_RULE", strategy: "reflex", percept },
        );
    }

    static isDecisionError(err: unknown): err is DecisionError {
        return err instanceof DecisionError;
    }
}

/**
 * Raised while building or loading a decision table (duplicate keys,
 * horizon overflow). Bootstrap only; the decision path never throws it.
 */
export class TableConfigError extends Error {
    constructor(message: string, opts?: { cause?: unknown }) {
        super(message, { cause: opts?.cause });
        this.name = "TableConfigError";
    }
}
