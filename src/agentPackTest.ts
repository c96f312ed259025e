import assert from "node:assert/strict";
import { fileURLToPath } from "node:url";
import { ZodError } from "zod";
import { buildInterpreter, createAgentFromPack, loadAgentPackFromFile, parseAgentPack } from "./agentPack.js";
import { TableConfigError } from "./errors/DecisionError.js";
import { runEpisode } from "./agent/episode.js";

const limits = { maxHorizon: 3 };

async function runAgentPackTests(): Promise<void> {
    const tablePack = parseAgentPack(
        {
            strategy: "table",
            entries: [
                { percepts: ["sunny"], action: "open" },
                { percepts: ["sunny", "rainy"], action: "close" },
            ],
        },
        limits,
    );
    assert.equal(tablePack.strategy, "table");
    const tableAgent = createAgentFromPack(tablePack);
    assert.deepEqual(tableAgent.advance("sunny"), { ok: true, action: "open" });
    assert.deepEqual(tableAgent.advance("rainy"), { ok: true, action: "close" });
    const third = tableAgent.advance("rainy");
    assert.equal(third.ok ? "ok" : third.error.code, "NO_MATCHING_HISTORY");

    assert.throws(() => parseAgentPack({ strategy: "table", entries: [] }, limits), ZodError);
    assert.throws(
        () => parseAgentPack({ strategy: "table", entries: [{ percepts: [], action: "open" }] }, limits),
        ZodError,
    );
    assert.throws(() => parseAgentPack({ strategy: "planner", entries: [] }, limits), ZodError);
    assert.throws(
        () => parseAgentPack(
            { strategy: "table", horizon: 1, entries: [{ percepts: ["a", "b"], action: "x" }] },
            limits,
        ),
        TableConfigError,
    );
    assert.throws(
        () => parseAgentPack(
            { strategy: "table", entries: [{ percepts: ["a", "b", "c", "d"], action: "x" }] },
            limits,
        ),
        TableConfigError,
    );
    assert.throws(
        () => createAgentFromPack(parseAgentPack(
            {
                strategy: "table",
                entries: [
                    { percepts: ["a"], action: "x" },
                    { percepts: ["a"], action: "y" },
                ],
            },
            limits,
        )),
        TableConfigError,
    );

    const reflexPack = parseAgentPack(
        {
            strategy: "reflex",
            interpret: { sunny: "good", rainy: "bad", fog: "murky" },
            rules: { good: "open", bad: "close" },
        },
        limits,
    );
    assert.equal(reflexPack.strategy, "reflex");
    if (reflexPack.strategy === "reflex") {
        const interpret = buildInterpreter(reflexPack);
        assert.deepEqual(interpret("sunny"), { kind: "recognized", state: "good" });
        assert.deepEqual(interpret("hail"), { kind: "unrecognized", percept: "hail" });
    }
    const reflexAgent = createAgentFromPack(reflexPack);
    assert.deepEqual(reflexAgent.advance("rainy"), { ok: true, action: "close" });
    const hail = reflexAgent.advance("hail");
    assert.equal(hail.ok ? "ok" : hail.error.code, "NO_APPLICABLE_RULE");
    const fog = reflexAgent.advance("fog");
    assert.equal(fog.ok ? "ok" : fog.error.code, "NO_APPLICABLE_RULE", "state without a rule");

    const withFallbackAgent = createAgentFromPack(
        parseAgentPack(
            {
                strategy: "reflex",
                interpret: { sunny: "good" },
                rules: { good: "open" },
                fallback: "close",
            },
            limits,
        ),
    );
    assert.deepEqual(withFallbackAgent.advance("hail"), { ok: true, action: "close" });

    // A complete pack at the default horizon parses without overflowing the stack
    const alphabet = ["sunny", "partly_cloudy", "cloudy", "rainy", "thunderstorm"];
    const entries: Array<{ percepts: string[]; action: string }> = [];
    let frontier: string[][] = [[]];
    for (let t = 1; t <= 8; t++) {
        const next: string[][] = [];
        for (const prefix of frontier) {
            for (const percept of alphabet) {
                const percepts = [...prefix, percept];
                next.push(percepts);
                entries.push({ percepts, action: percept === "sunny" ? "open" : "close" });
            }
        }
        frontier = next;
    }
    assert.equal(entries.length, 488_280);
    const largePack = parseAgentPack({ strategy: "table", horizon: 8, entries }, { maxHorizon: 8 });
    assert.equal(largePack.strategy === "table" ? largePack.entries.length : 0, 488_280);
    const largeAgent = createAgentFromPack(largePack);
    assert.deepEqual(largeAgent.advance("cloudy"), { ok: true, action: "close" });
    assert.deepEqual(largeAgent.advance("sunny"), { ok: true, action: "open" });
    assert.throws(
        () => parseAgentPack({ strategy: "table", entries }, { maxHorizon: 7 }),
        TableConfigError,
    );

    // Shipped packs
    const shippedTable = await loadAgentPackFromFile(
        fileURLToPath(new URL("../config/weather-table.json", import.meta.url)),
        limits,
    );
    const report = runEpisode(createAgentFromPack(shippedTable), ["sunny", "rainy", "sunny"]);
    assert.deepEqual(
        report.steps.map((s) => (s.result.ok ? s.result.action : s.result.error.code)),
        ["open", "close", "NO_MATCHING_HISTORY"],
    );

    const shippedReflex = await loadAgentPackFromFile(
        fileURLToPath(new URL("../config/weather-reflex.json", import.meta.url)),
        limits,
    );
    const reflexReport = runEpisode(createAgentFromPack(shippedReflex), ["sunny", "cloudy", "thunderstorm"]);
    assert.deepEqual(
        reflexReport.steps.map((s) => (s.result.ok ? s.result.action : s.result.error.code)),
        ["open", "NO_APPLICABLE_RULE", "close"],
    );
}

await runAgentPackTests();
console.log("Agent pack tests passed.");
