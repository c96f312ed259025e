import type { Interpretation } from "./reflex/interpretation.js";
import { recognized, unrecognized } from "./reflex/interpretation.js";

export const WEATHER = ["sunny", "partly_cloudy", "cloudy", "rainy", "thunderstorm"] as const;

export type Weather = (typeof WEATHER)[number];

export type Window = "open" | "close";

export type Outlook = "good" | "bad";

/** Cloudy is deliberately left unclassified */
export function interpretWeather(weather: Weather): Interpretation<Outlook, Weather> {
    switch (weather) {
        case "sunny":
        case "partly_cloudy":
            return recognized("good");
        case "rainy":
        case "thunderstorm":
            return recognized("bad");
        default:
            return unrecognized(weather);
    }
}

export function windowForOutlook(outlook: Outlook): Window {
    return outlook === "good" ? "open" : "close";
}
