// ── Channels ────────────────────────────────────────────────────────
export { defineChannels } from "./channels/define-channels";
export type { ChannelId, ChannelOf, ChannelSet } from "./channels/types";
// ── Errors ──────────────────────────────────────────────────────────
export { UndeclaredChannelError, UnknownChannelError } from "./core/errors";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler } from "./core/logger/console-handler";
export { Logger } from "./core/logger/logger";
export type { LogEntry, LogHandler, LogLevel, LoggerOptions } from "./core/logger/types";
// ── Registry ────────────────────────────────────────────────────────
export { ListenerFailurePolicy } from "./core/registry/enums";
export { createRegistry } from "./core/registry/helpers";
export { ChannelRegistry } from "./core/registry/registry";
export type { ChannelEntry, RegistryConfig } from "./core/registry/types";
// ── Source ──────────────────────────────────────────────────────────
export { EventSource } from "./core/source/event-source";
export type { Source } from "./core/source/types";
// ── Shared contracts ────────────────────────────────────────────────
export type { Listener, LoggerContext } from "./core/types";
