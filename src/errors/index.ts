/**
 * Error utilities — barrel export.
 */

export { describeForOperator, extractErrorMessage } from "../errors.js";
export {
    DECISION_ERROR_CODES,
    DecisionError,
    TableConfigError,
    isDecisionErrorCode,
} from "./DecisionError.js";
export type { DecisionErrorCode, DecisionStrategy } from "./DecisionError.js";
