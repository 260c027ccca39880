import type { LogEntry, LogHandler } from "./types";

const dim = "\x1b[90m";
const cyan = "\x1b[36m";
const green = "\x1b[32m";
const yellow = "\x1b[33m";
const magenta = "\x1b[35m";
const reset = "\x1b[0m";

type Palette = {
    dim: string;
    key: string;
    str: string;
    num: string;
    nil: string;
    reset: string;
};

const COLORS: Palette = { dim, key: cyan, str: green, num: yellow, nil: magenta, reset };
const PLAIN: Palette = { dim: "", key: "", str: "", num: "", nil: "", reset: "" };

export type ConsoleHandlerOptions = {
    /** Emit ANSI colour codes. Defaults to `true`. */
    colors?: boolean;
};

function formatTime(ts: number): string {
    const d = new Date(ts);
    const h = String(d.getHours()).padStart(2, "0");
    const m = String(d.getMinutes()).padStart(2, "0");
    const s = String(d.getSeconds()).padStart(2, "0");
    return `${h}:${m}:${s}`;
}

function formatValue(value: unknown, p: Palette): string {
    if (value === null) return `${p.nil}null${p.reset}`;
    if (value === undefined) return `${p.dim}undefined${p.reset}`;
    if (typeof value === "string") return `${p.str}"${value}"${p.reset}`;
    if (typeof value === "number" || typeof value === "boolean") return `${p.num}${value}${p.reset}`;
    if (typeof value === "bigint") return `${p.num}${value}n${p.reset}`;
    if (value instanceof Error) return `${p.nil}${value.name}: ${value.message}${p.reset}`;
    if (Array.isArray(value)) {
        if (value.length === 0) return "[]";
        return `[${value.map((v) => formatValue(v, p)).join(`${p.dim},${p.reset} `)}]`;
    }
    if (typeof value === "object") {
        const entries = Object.entries(value);
        if (entries.length === 0) return "{}";
        const pairs = entries.map(([k, v]) => `${p.key}${k}${p.reset}${p.dim}:${p.reset} ${formatValue(v, p)}`);
        return `${p.dim}{${p.reset} ${pairs.join(`${p.dim},${p.reset} `)} ${p.dim}}${p.reset}`;
    }
    return String(value);
}

export function createConsoleHandler(options: ConsoleHandlerOptions = {}): LogHandler {
    const palette = options.colors === false ? PLAIN : COLORS;
    return (entry: LogEntry) => {
        const time = formatTime(entry.timestamp);
        const tag = entry.level === "debug" ? "evented" : entry.level;
        const detailsPart = entry.details ? ` ${formatValue(entry.details, palette)}` : "";
        const line = `${time} [${tag}] ${entry.code} → ${entry.message}${detailsPart}`;

        if (entry.level === "error") {
            console.error(line);
        } else if (entry.level === "warn") {
            console.warn(line);
        } else {
            console.log(line);
        }
    };
}
