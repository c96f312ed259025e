/**
 * Agent packs — JSON documents that configure a decision strategy.
 *
 * A pack is supplied fully built before the first percept arrives:
 *   - table packs list every percept sequence the agent can answer
 *   - reflex packs classify percepts into states and map states to actions
 *
 * Percepts, states and actions are strings in pack form.
 */
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { DecisionTable } from "./brain/table/decisionTable.js";
import { TableDrivenAgent } from "./brain/table/agent.js";
import { SimpleReflexAgent, rejectUnrecognized, withFallback } from "./brain/reflex/agent.js";
import { recognized, unrecognized, type InterpretInput } from "./brain/reflex/interpretation.js";
import type { IDecisionCore } from "./brain/interface.js";
import { TableConfigError } from "./errors/DecisionError.js";

const tableEntrySchema = z.object({
    percepts: z.array(z.string().min(1)).min(1),
    action: z.string().min(1),
});

const tablePackSchema = z.object({
    strategy: z.literal("table"),
    name: z.string().optional(),
    version: z.string().optional(),
    /** Longest sequence the pack is allowed to contain */
    horizon: z.number().int().positive().optional(),
    entries: z.array(tableEntrySchema).min(1),
});

const reflexPackSchema = z.object({
    strategy: z.literal("reflex"),
    name: z.string().optional(),
    version: z.string().optional(),
    /** percept → state; percepts not listed are unrecognized */
    interpret: z.record(z.string(), z.string().min(1)),
    /** state → action; states not listed have no applicable rule */
    rules: z.record(z.string(), z.string().min(1)),
    /** Explicit action for percepts no rule covers */
    fallback: z.string().min(1).optional(),
});

const agentPackSchema = z.discriminatedUnion("strategy", [tablePackSchema, reflexPackSchema]);

export type TablePack = z.infer<typeof tablePackSchema>;
export type ReflexPack = z.infer<typeof reflexPackSchema>;
export type AgentPack = z.infer<typeof agentPackSchema>;

export interface PackLimits {
    /** Packs whose sequences exceed this are rejected */
    maxHorizon: number;
}

export function parseAgentPack(raw: unknown, limits: PackLimits): AgentPack {
    const pack = agentPackSchema.parse(raw);
    if (pack.strategy === "table") {
        const longest = pack.entries.reduce((max, e) => Math.max(max, e.percepts.length), 0);
        const horizon = pack.horizon ?? longest;
        if (longest > horizon) {
            throw new TableConfigError(
                `Table pack declares horizon ${horizon} but has a sequence of length ${longest}`,
            );
        }
        if (horizon > limits.maxHorizon) {
            throw new TableConfigError(
                `Table pack horizon ${horizon} exceeds the configured maximum of ${limits.maxHorizon}`,
            );
        }
    }
    return pack;
}

export async function loadAgentPackFromFile(filePath: string, limits: PackLimits): Promise<AgentPack> {
    const rawText = await readFile(filePath, "utf8");
    const raw: unknown = JSON.parse(rawText);
    return parseAgentPack(raw, limits);
}

export function buildTable(pack: TablePack): DecisionTable<string, string> {
    return new DecisionTable(pack.entries);
}

export function buildInterpreter(pack: ReflexPack): InterpretInput<string, string> {
    const states = new Map(Object.entries(pack.interpret));
    return (percept) => {
        const state = states.get(percept);
        return state === undefined ? unrecognized(percept) : recognized(state);
    };
}

/** Build the agent a pack describes */
export function createAgentFromPack(pack: AgentPack): IDecisionCore<string, string> {
    if (pack.strategy === "table") {
        return new TableDrivenAgent(buildTable(pack));
    }
    const rules = new Map(Object.entries(pack.rules));
    const matchRule = rejectUnrecognized<string, string, string>((state) => rules.get(state));
    return new SimpleReflexAgent(
        buildInterpreter(pack),
        pack.fallback === undefined ? matchRule : withFallback(matchRule, pack.fallback),
    );
}
