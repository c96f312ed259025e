/**
 * Decision core — public surface for embedding an agent in a driver.
 */

export { decided, declined } from "./interface.js";
export type { DecisionResult, IDecisionCore } from "./interface.js";
export { DecisionTable, enumerateTable, tableSizeForHorizon } from "./table/decisionTable.js";
export type { DecisionTableOptions, SequencePolicy, TableEntry, TableLookup } from "./table/decisionTable.js";
export { TableDrivenAgent, resolveFromTable } from "./table/agent.js";
export { SimpleReflexAgent, rejectUnrecognized, resolveReflex, withFallback } from "./reflex/agent.js";
export type { RuleMatch, StateRules } from "./reflex/agent.js";
export { recognizeAll, recognized, sameInterpretation, unrecognized } from "./reflex/interpretation.js";
export type { Interpretation, InterpretInput } from "./reflex/interpretation.js";
export { PerceptLog } from "../perception/log.js";
export { jsonPerceptKey, sameValueZero, sequenceKey, sequencesEqual } from "../perception/interface.js";
export { PerceptInterner } from "../perception/interner.js";
export type { PerceptKey, PerceptSequence } from "../perception/interface.js";
export { DecisionError, TableConfigError } from "../errors/DecisionError.js";
export type { DecisionErrorCode, DecisionStrategy } from "../errors/DecisionError.js";
