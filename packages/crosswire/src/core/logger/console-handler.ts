import type { LogEntry } from "./types";

const dim = "\x1b[90m";
const cyan = "\x1b[36m";
const green = "\x1b[32m";
const yellow = "\x1b[33m";
const magenta = "\x1b[35m";
const reset = "\x1b[0m";

function formatTime(ts: number): string {
    const d = new Date(ts);
    return [d.getHours(), d.getMinutes(), d.getSeconds()].map((n) => String(n).padStart(2, "0")).join(":");
}

function colorizeValue(value: unknown): string {
    if (value === null) return `${magenta}null${reset}`;
    if (value === undefined) return `${dim}undefined${reset}`;
    if (typeof value === "string") return `${green}"${value}"${reset}`;
    if (typeof value === "number" || typeof value === "boolean") return `${yellow}${value}${reset}`;
    if (typeof value === "function") return `${cyan}[fn ${value.name || "anonymous"}]${reset}`;
    if (Array.isArray(value)) {
        if (value.length === 0) return "[]";
        return `[${value.map(colorizeValue).join(`${dim},${reset} `)}]`;
    }
    if (typeof value === "object") {
        const entries = Object.entries(value);
        if (entries.length === 0) return "{}";
        const pairs = entries.map(([k, v]) => `${cyan}${k}${reset}${dim}:${reset} ${colorizeValue(v)}`);
        return `${dim}{${reset} ${pairs.join(`${dim},${reset} `)} ${dim}}${reset}`;
    }
    return String(value);
}

/**
 * Console transport. Debug entries are tagged `[crosswire]`, the rest with their level.
 */
export function createConsoleHandler(): (entry: LogEntry) => void {
    return (entry: LogEntry) => {
        const tag = entry.level === "debug" ? "crosswire" : entry.level;
        const detailsPart = entry.details ? ` ${colorizeValue(entry.details)}` : "";
        const line = `${formatTime(entry.timestamp)} [${tag}] ${entry.code} → ${entry.message}${detailsPart}`;

        switch (entry.level) {
            case "error":
                console.error(line);
                break;
            case "warn":
                console.warn(line);
                break;
            default:
                console.log(line);
        }
    };
}
