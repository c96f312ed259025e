export interface Logger {
    info: (...args: unknown[]) => void;
    warn: (...args: unknown[]) => void;
    error: (...args: unknown[]) => void;
}

export type LogLevel = "info" | "warn" | "error";

/** Receives one formatted line per log call */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
    level?: string;
    /** Output JSON lines instead of human-readable text. Default: false */
    json?: boolean;
    /** Where lines go. Default: stdout, stderr for errors */
    sink?: LogSink;
    /** Clock used for timestamps. Default: current time */
    now?: () => Date;
}

const consoleSink: LogSink = (level, line) => {
    if (level === "error") {
        process.stderr.write(line + "\n");
    } else {
        process.stdout.write(line + "\n");
    }
};

/**
 * Render any value for a log line. Values JSON cannot encode (bigints,
 * symbols, cycles) fall back to String(), then to a type tag.
 */
export function formatValue(value: unknown): string {
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        try {
            return String(value);
        } catch {
            return `[${typeof value}]`;
        }
    }
}

function formatArg(arg: unknown): string {
    if (typeof arg === "string") return arg;
    if (arg instanceof Error) return arg.message;
    return formatValue(arg);
}

export function createLogger(levelOrOpts: string | LoggerOptions): Logger {
    const opts: LoggerOptions = typeof levelOrOpts === "string"
        ? { level: levelOrOpts, json: false }
        : levelOrOpts;
    const canInfo = opts.level !== "silent";
    const json = opts.json ?? (process.env.LOG_FORMAT === "json");
    const sink = opts.sink ?? consoleSink;
    const now = opts.now ?? (() => new Date());

    const emit = json
        ? createJsonEmitter(sink, now)
        : (level: LogLevel, args: unknown[]) => {
            const tag = level.toUpperCase();
            sink(level, `[${now().toISOString()}] [${tag}] ${args.map(formatArg).join(" ")}`);
        };

    return {
        info: (...args: unknown[]) => {
            if (!canInfo) return;
            emit("info", args);
        },
        warn: (...args: unknown[]) => emit("warn", args),
        error: (...args: unknown[]) => emit("error", args),
    };
}

/** JSON structured logger — one JSON object per line, compatible with cloud log aggregators */
function createJsonEmitter(sink: LogSink, now: () => Date) {
    return (level: LogLevel, args: unknown[]) => {
        const msg = args.map(formatArg).join(" ");
        const entry: Record<string, unknown> = {
            ts: now().toISOString(),
            level,
            msg,
        };

        // Extract agent id from a leading "[agent-id]" tag for structured queries
        const agentMatch = msg.match(/^\[([\w.-]+)\]/);
        if (agentMatch) {
            entry.agentId = agentMatch[1];
        }

        sink(level, JSON.stringify(entry));
    };
}
