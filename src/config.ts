/**
 * Environment-driven configuration for the agent runner.
 */

function optionalAny(keys: string[], fallback: string): string {
    for (const key of keys) {
        const value = process.env[key];
        if (value) return value;
    }
    return fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
    const raw = process.env[key];
    if (raw == null) return fallback;
    return raw.toLowerCase() === "true" || raw === "1";
}

function optionalInt(key: string, fallback: number): number {
    const raw = process.env[key];
    if (!raw) return fallback;
    const value = Number.parseInt(raw, 10);
    return Number.isFinite(value) ? value : fallback;
}

export function loadConfig() {
    return {
        // Agent
        agentId: optionalAny(["AGENT_ID"], "agent-0"),
        agentPackPath: optionalAny(["AGENT_PACK_PATH", "DECISION_TABLE_PATH"], "config/weather-table.json"),
        maxTableHorizon: optionalInt("MAX_TABLE_HORIZON", 8),

        // Driver
        stopOnFailure: optionalBool("STOP_ON_FAILURE", false),

        // Logging
        logLevel: optionalAny(["LOG_LEVEL"], "info"),
        logJson: optionalAny(["LOG_FORMAT"], "text") === "json",
    } as const;
}


export const config = loadConfig();
