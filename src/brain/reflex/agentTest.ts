import assert from "node:assert/strict";
import { SimpleReflexAgent, rejectUnrecognized, resolveReflex, withFallback, type RuleMatch } from "./agent.js";
import { DecisionError } from "../../errors/DecisionError.js";
import { recognizeAll, recognized, sameInterpretation, unrecognized } from "./interpretation.js";
import {
    WEATHER,
    interpretWeather,
    windowForOutlook,
    type Outlook,
    type Weather,
    type Window,
} from "../weatherFixtures.js";

function runReflexAgentTests(): void {
    const matchRule = rejectUnrecognized<Outlook, Weather, Window>(windowForOutlook);
    const agent = new SimpleReflexAgent(interpretWeather, matchRule);

    // Cloudy is unrecognized and declined; sunny opens
    const cloudy = agent.advance("cloudy");
    assert.equal(cloudy.ok, false);
    if (!cloudy.ok) {
        assert.equal(cloudy.error.code, "NO_APPLICABLE_RULE");
        assert.equal(cloudy.error.strategy, "reflex");
        assert.equal(cloudy.error.percept, "cloudy");
    }
    assert.deepEqual(agent.advance("sunny"), { ok: true, action: "open" });
    assert.deepEqual(agent.advance("thunderstorm"), { ok: true, action: "close" });

    // Referential transparency: same percept, same result, every time
    const fresh = new SimpleReflexAgent(interpretWeather, matchRule);
    for (let i = 0; i < 5; i++) {
        assert.deepEqual(fresh.advance("sunny"), { ok: true, action: "open" });
    }
    for (const weather of WEATHER) {
        const first = fresh.advance(weather);
        fresh.advance("rainy");
        const second = fresh.advance(weather);
        assert.equal(first.ok, second.ok, `stable outcome for ${weather}`);
        if (first.ok && second.ok) assert.equal(first.action, second.action);
        if (!first.ok && !second.ok) assert.equal(first.error.code, second.error.code);
    }

    // Interpretation is total over the whole percept domain
    const expected: Record<Weather, string> = {
        sunny: "recognized",
        partly_cloudy: "recognized",
        cloudy: "unrecognized",
        rainy: "recognized",
        thunderstorm: "recognized",
    };
    for (const weather of WEATHER) {
        const interpretation = interpretWeather(weather);
        assert.equal(interpretation.kind, expected[weather], `interpretation of ${weather}`);
        if (interpretation.kind === "unrecognized") {
            assert.equal(interpretation.percept, weather, "original percept is kept");
        }
    }

    // Unrecognized states compare by carried percept
    assert.ok(sameInterpretation(unrecognized("cloudy"), unrecognized("cloudy")));
    assert.ok(!sameInterpretation<Outlook, Weather>(unrecognized("cloudy"), unrecognized("rainy")));
    assert.ok(!sameInterpretation<Outlook, Weather>(recognized("good"), unrecognized("sunny")));
    assert.ok(sameInterpretation(interpretWeather("sunny"), interpretWeather("partly_cloudy")));

    // Fallback is an explicit caller choice
    const cautious = new SimpleReflexAgent(interpretWeather, withFallback(matchRule, "close"));
    assert.deepEqual(cautious.advance("cloudy"), { ok: true, action: "close" });
    assert.deepEqual(cautious.advance("sunny"), { ok: true, action: "open" });

    // Rules may decline recognized states too
    const onlyGood = rejectUnrecognized<Outlook, Weather, Window>((outlook) =>
        outlook === "good" ? "open" : undefined,
    );
    const declinedBad = resolveReflex("rainy", interpretWeather, onlyGood);
    assert.equal(declinedBad.ok, false);
    if (!declinedBad.ok) {
        assert.equal(declinedBad.error.code, "NO_APPLICABLE_RULE");
        assert.equal(declinedBad.error.percept, undefined);
    }

    // Identity interpretation: the percept is the state
    const echo: RuleMatch<number, number, string> = (interpretation) =>
        interpretation.kind === "recognized"
            ? { ok: true, action: `n=${interpretation.state}` }
            : { ok: false, error: DecisionError.noApplicableRule(interpretation.percept) };
    const identityAgent = new SimpleReflexAgent<number, number, string>(recognizeAll, echo);
    assert.deepEqual(identityAgent.advance(7), { ok: true, action: "n=7" });
}

runReflexAgentTests();
console.log("Reflex agent tests passed.");
