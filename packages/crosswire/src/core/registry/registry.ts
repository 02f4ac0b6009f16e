import { once } from "es-toolkit";
import type { ChannelId, ChannelSet } from "../../channels/types";
import { UnknownChannelError } from "../errors";
import { createConsoleHandler } from "../logger/console-handler";
import { Logger } from "../logger/logger";
import type { Source } from "../source/types";
import type { Listener } from "../types";
import { ListenerFailurePolicy } from "./enums";
import type { ChannelEntry, RegistryConfig } from "./types";

const LOG_CODE = "registry";

/**
 * Cross-wires sources and listeners per channel, regardless of arrival order.
 *
 * - A listener added before any source is held back and attached to every
 *   source that declares the channel later.
 * - A listener added after sources exist is attached to all of them at once.
 * - Firing never goes through the registry: each source calls its own,
 *   already synchronised listener set.
 *
 * Collections are reference-keyed sets, so registering the same source or
 * listener twice on one channel is a no-op.
 */
export class ChannelRegistry<TId extends ChannelId, T> {
    readonly logger: Logger;
    readonly listenerFailure: ListenerFailurePolicy;
    private readonly entries: Map<TId, ChannelEntry<TId, T>> = new Map();

    constructor(
        readonly channels: ChannelSet<TId>,
        config?: RegistryConfig,
    ) {
        this.listenerFailure = config?.listenerFailure ?? ListenerFailurePolicy.PROPAGATE;

        this.logger = new Logger({ level: config?.logger?.level ?? "warn" });
        if (config?.logger?.console !== false) {
            this.logger.addHandler(createConsoleHandler());
        }
        for (const handler of config?.logger?.handlers ?? []) {
            this.logger.addHandler(handler);
        }

        this.initialize();
    }

    /**
     * Ensure an empty entry per channel. Existing entries are cleared in place,
     * and listeners handed out by this registry are detached from their sources
     * first, so nothing from a previous session keeps firing.
     */
    initialize(): void {
        for (const channel of this.channels.ids) {
            const entry = this.entries.get(channel);
            if (!entry) {
                this.entries.set(channel, { sources: new Set(), listeners: new Set() });
                continue;
            }
            const listeners = [...entry.listeners];
            for (const source of [...entry.sources]) {
                for (const listener of listeners) {
                    source.detach(channel, listener);
                }
            }
            entry.sources.clear();
            entry.listeners.clear();
        }
        this.logger.debug(LOG_CODE, "initialized", { channels: this.channels.ids.length });
    }

    assertChannel(channel: string): asserts channel is TId {
        if (!this.channels.has(channel)) {
            throw new UnknownChannelError(channel);
        }
    }

    /**
     * Back-fill `source` with the recorded listeners, then record it.
     *
     * Meant to be called from `Source.declare`, after the source has created its
     * local collection; attachments sent before that are ignored by the source.
     */
    addSource(channel: TId, source: Source<TId, T>): void {
        const entry = this.entry(channel);
        if (entry.sources.has(source)) {
            this.logger.debug(LOG_CODE, "duplicate source ignored", { channel });
            return;
        }

        const backfill = [...entry.listeners];
        for (const listener of backfill) {
            source.attach(channel, listener);
        }
        entry.sources.add(source);
        // Listeners removed during the pass could not detach from a source not yet recorded.
        for (const listener of backfill.filter((l) => !entry.listeners.has(l))) {
            source.detach(channel, listener);
        }
        // Listeners that arrived during the pass saw neither this source nor the back-fill.
        for (const listener of [...entry.listeners].filter((l) => !backfill.includes(l))) {
            source.attach(channel, listener);
        }
        this.logger.debug(LOG_CODE, "source added", { channel, listeners: entry.listeners.size });
    }

    /**
     * Attach `listener` to every source on `channel`, then record it for
     * sources that declare the channel later.
     *
     * @returns Unsubscribe function; calls {@link removeListener} once.
     */
    addListener(channel: TId, listener: Listener<T>): () => void {
        const entry = this.entry(channel);
        const unsubscribe = once(() => this.removeListener(channel, listener));
        if (entry.listeners.has(listener)) {
            this.logger.debug(LOG_CODE, "duplicate listener ignored", { channel });
            return unsubscribe;
        }

        const targets = [...entry.sources];
        for (const source of targets) {
            source.attach(channel, listener);
        }
        entry.listeners.add(listener);
        // Sources that joined during the pass were back-filled before the listener was recorded.
        for (const source of [...entry.sources].filter((s) => !targets.includes(s))) {
            source.attach(channel, listener);
        }
        this.logger.debug(LOG_CODE, "listener added", { channel, sources: entry.sources.size });
        return unsubscribe;
    }

    /** Drop `source` and detach the listeners it got from here. Listeners stay recorded. */
    removeSource(channel: TId, source: Source<TId, T>): void {
        const entry = this.entry(channel);
        if (!entry.sources.delete(source)) return;

        for (const listener of [...entry.listeners]) {
            source.detach(channel, listener);
        }
        this.logger.debug(LOG_CODE, "source removed", { channel });
    }

    removeListener(channel: TId, listener: Listener<T>): void {
        const entry = this.entry(channel);
        if (!entry.listeners.delete(listener)) return;

        for (const source of [...entry.sources]) {
            source.detach(channel, listener);
        }
        this.logger.debug(LOG_CODE, "listener removed", { channel });
    }

    /** Registered sources for `channel`, in registration order. */
    sources(channel: TId): readonly Source<TId, T>[] {
        return [...this.entry(channel).sources];
    }

    /** Recorded listeners for `channel`, in registration order. */
    listeners(channel: TId): readonly Listener<T>[] {
        return [...this.entry(channel).listeners];
    }

    private entry(channel: TId): ChannelEntry<TId, T> {
        const entry = this.entries.get(channel);
        if (!entry) {
            throw new UnknownChannelError(channel);
        }
        return entry;
    }
}
