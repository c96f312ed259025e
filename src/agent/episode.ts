/**
 * Episode driver — Feeds percepts into a decision core.
 *
 * Drives a sequence of decision steps for one agent:
 *   1. Advance — hand the next percept to the core, in receipt order
 *   2. Report  — log the action, or the failure and its operator message
 *   3. Signal  — pass failures to the caller's handler
 *
 * The driver does NOT act on the environment — that's the caller's job.
 * Percepts are never skipped, reordered or replayed.
 */

import type { IDecisionCore, DecisionResult } from "../brain/interface.js";
import type { DecisionError } from "../errors/DecisionError.js";
import { formatValue, type Logger } from "../logger.js";

// ═══════════════════════════════════════════════════════
//                   Episode Result
// ═══════════════════════════════════════════════════════

export interface EpisodeStep<P, A> {
    /** Zero-based position of the percept in the episode */
    index: number;
    percept: P;
    result: DecisionResult<A>;
}

export interface EpisodeReport<P, A> {
    steps: EpisodeStep<P, A>[];
    decided: number;
    declined: number;
    /** True when the driver terminated the agent after a failure */
    stopped: boolean;
}

export interface EpisodeOptions<P> {
    logger?: Logger;
    /** Prefix for log lines, e.g. the agent id */
    tag?: string;
    /** Called for every failure, e.g. to raise a maintenance signal */
    onFailure?: (error: DecisionError, percept: P, index: number) => void;
    /** Terminate the agent on the first failure instead of continuing */
    stopOnFailure?: boolean;
}

// ═══════════════════════════════════════════════════════
//                   Decision Loop
// ═══════════════════════════════════════════════════════

/**
 * Run every percept through `core`, in order.
 *
 * @returns One step per percept handed to the core
 */
export function runEpisode<P, A>(
    core: IDecisionCore<P, A>,
    percepts: Iterable<P>,
    opts: EpisodeOptions<P> = {},
): EpisodeReport<P, A> {
    const prefix = opts.tag ? `[${opts.tag}] ` : "";
    const report: EpisodeReport<P, A> = { steps: [], decided: 0, declined: 0, stopped: false };

    let index = 0;
    for (const percept of percepts) {
        const result = core.advance(percept);
        report.steps.push({ index, percept, result });

        if (result.ok) {
            report.decided++;
            opts.logger?.info(`${prefix}step ${index}: ${formatValue(percept)} -> ${formatValue(result.action)}`);
        } else {
            report.declined++;
            opts.logger?.warn(
                `${prefix}step ${index}: ${result.error.code} (${result.error.operatorMessage})`,
            );
            opts.onFailure?.(result.error, percept, index);
            if (opts.stopOnFailure) {
                report.stopped = true;
                opts.logger?.error(`${prefix}agent terminated after step ${index}`);
                break;
            }
        }
        index++;
    }

    return report;
}
