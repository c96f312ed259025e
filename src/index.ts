#!/usr/bin/env node
/**
 * Agent decision runner
 *
 * Loads an agent pack (table or reflex strategy) and feeds it the percepts
 * given on the command line, one decision per percept:
 *
 *   agent-decide sunny rainy cloudy
 *
 * Each failure is reported with its operator message; the exit code is 1
 * if any percept went undecided.
 */

import "dotenv/config";
import { ZodError } from "zod";
import { config } from "./config.js";
import { createLogger } from "./logger.js";
import { createAgentFromPack, loadAgentPackFromFile } from "./agentPack.js";
import { runEpisode } from "./agent/episode.js";
import { extractErrorMessage } from "./errors.js";

const log = createLogger({ level: config.logLevel, json: config.logJson });

async function main(): Promise<number> {
    const percepts = process.argv.slice(2);
    if (percepts.length === 0) {
        log.error("Usage: agent-decide <percept> [percept...]");
        return 2;
    }

    const pack = await loadAgentPackFromFile(config.agentPackPath, {
        maxHorizon: config.maxTableHorizon,
    });
    log.info(
        `[${config.agentId}] loaded ${pack.strategy} pack ${pack.name ?? config.agentPackPath}`,
    );

    const report = runEpisode(createAgentFromPack(pack), percepts, {
        logger: log,
        tag: config.agentId,
        stopOnFailure: config.stopOnFailure,
    });
    log.info(
        `[${config.agentId}] ${report.decided} decided, ${report.declined} declined${report.stopped ? ", terminated" : ""}`,
    );
    return report.declined > 0 ? 1 : 0;
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        if (err instanceof ZodError) {
            log.error(`Invalid agent pack ${config.agentPackPath}:`, err.issues);
        } else {
            log.error(`Failed to run agent: ${extractErrorMessage(err)}`);
        }
        process.exitCode = 1;
    });
