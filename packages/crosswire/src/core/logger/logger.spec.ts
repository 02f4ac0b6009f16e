/**
 * Contract: Logger -- transport-based logging with pluggable handlers.
 *
 * Sections:
 *   1. Handler management
 *   2. Level threshold
 *   3. Entry shape
 *   4. Console handler formatting
 */
import { describe, expect, it, vi } from "vitest";
import { createConsoleHandler } from "./console-handler";
import { Logger } from "./logger";
import type { LogEntry } from "./types";

describe("Logger", () => {
    // -- 1. Handler management --
    describe("Handler management", () => {
        it("fans out to every registered handler", () => {
            const logger = new Logger();
            const a = vi.fn();
            const b = vi.fn();
            logger.addHandler(a);
            logger.addHandler(b);
            logger.debug("registry", "initialized");
            expect(a).toHaveBeenCalledOnce();
            expect(b).toHaveBeenCalledOnce();
        });

        it("removeHandler stops the handler from receiving entries", () => {
            const logger = new Logger();
            const handler = vi.fn();
            logger.addHandler(handler);
            logger.removeHandler(handler);
            logger.warn("registry", "hello");
            expect(handler).not.toHaveBeenCalled();
        });

        it("no handlers means no error", () => {
            expect(() => new Logger().error("registry", "silent")).not.toThrow();
        });
    });

    // -- 2. Level threshold --
    describe("Level threshold", () => {
        it("defaults to debug: every level passes", () => {
            const logger = new Logger();
            const handler = vi.fn();
            logger.addHandler(handler);
            logger.debug("a", "1");
            logger.warn("a", "2");
            logger.error("a", "3");
            expect(handler).toHaveBeenCalledTimes(3);
        });

        it("level 'warn' drops debug entries", () => {
            const logger = new Logger({ level: "warn" });
            const levels: string[] = [];
            logger.addHandler((e) => levels.push(e.level));
            logger.debug("a", "1");
            logger.warn("a", "2");
            logger.error("a", "3");
            expect(levels).toEqual(["warn", "error"]);
        });

        it("isEnabled reflects the threshold", () => {
            const logger = new Logger({ level: "error" });
            expect(logger.isEnabled("debug")).toBe(false);
            expect(logger.isEnabled("warn")).toBe(false);
            expect(logger.isEnabled("error")).toBe(true);
        });
    });

    // -- 3. Entry shape --
    describe("Entry shape", () => {
        it("carries level, code, message, details and a timestamp", () => {
            const logger = new Logger();
            const entries: LogEntry[] = [];
            logger.addHandler((e) => entries.push(e));
            logger.error("player", "listener failed", { channel: "scored" });
            expect(entries).toHaveLength(1);
            expect(entries[0]).toMatchObject({
                level: "error",
                code: "player",
                message: "listener failed",
                details: { channel: "scored" },
            });
            expect(entries[0]?.timestamp).toBeGreaterThan(0);
        });

        it("details is undefined when not provided", () => {
            const logger = new Logger();
            const entries: LogEntry[] = [];
            logger.addHandler((e) => entries.push(e));
            logger.debug("registry", "msg");
            expect(entries[0]?.details).toBeUndefined();
        });
    });

    // -- 4. Console handler --
    describe("Console handler (createConsoleHandler)", () => {
        it("logs debug to console.log tagged [crosswire]", () => {
            const spy = vi.spyOn(console, "log").mockImplementation(() => {});
            createConsoleHandler()({ level: "debug", code: "registry", message: "initialized", timestamp: 0 });
            expect(spy).toHaveBeenCalledOnce();
            expect(spy.mock.calls[0]?.[0]).toContain("[crosswire] registry → initialized");
            spy.mockRestore();
        });

        it("logs warn to console.warn", () => {
            const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
            createConsoleHandler()({ level: "warn", code: "registry", message: "slow", timestamp: 0 });
            expect(spy).toHaveBeenCalledOnce();
            expect(spy.mock.calls[0]?.[0]).toContain("[warn]");
            spy.mockRestore();
        });

        it("logs error to console.error with colourised details", () => {
            const spy = vi.spyOn(console, "error").mockImplementation(() => {});
            createConsoleHandler()({
                level: "error",
                code: "player",
                message: "listener failed",
                details: { channel: "scored" },
                timestamp: 0,
            });
            expect(spy).toHaveBeenCalledOnce();
            expect(spy.mock.calls[0]?.[0]).toContain(
                "[error] player → listener failed \x1b[90m{\x1b[0m \x1b[36mchannel\x1b[0m\x1b[90m:\x1b[0m \x1b[32m\"scored\"\x1b[0m \x1b[90m}\x1b[0m",
            );
            spy.mockRestore();
        });
    });
});
