/**
 * Error sanitization — operator-facing signals for decision failures.
 *
 * The decision core only reports which failure kind occurred. Adapters use
 * these helpers to turn that into a message for an operator (maintenance
 * indicator, alert text) without echoing raw percept data.
 */

import type { DecisionErrorCode } from "./errors/DecisionError.js";

/** Known failure codes → operator-facing replacements */
const OPERATOR_MESSAGES = new Map<string, string>(Object.entries({
    NO_MATCHING_HISTORY:
        "No table entry covers the current percept history. The agent needs a wider table or a reset.",
    NO_APPLICABLE_RULE:
        "No rule applies to the current input. Manual attention may be required.",
} satisfies Record<DecisionErrorCode, string>));

/**
 * Sanitize a decision failure for operator display.
 * Unknown codes fall back to a generic message.
 */
export function describeForOperator(code: string): string {
    // Generic fallback — never expose raw internals
    return OPERATOR_MESSAGES.get(code) ?? "The agent could not decide on an action.";
}

/**
 * Extract error message from unknown catch value.
 */
export function extractErrorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === "string") return err;
    return String(err);
}
