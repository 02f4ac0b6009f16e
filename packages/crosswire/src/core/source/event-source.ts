import type { ChannelId } from "../../channels/types";
import { UndeclaredChannelError } from "../errors";
import { ListenerFailurePolicy } from "../registry/enums";
import type { ChannelRegistry } from "../registry/registry";
import type { Listener } from "../types";
import type { Source } from "./types";

/**
 * Stock {@link Source} implementation. Participants compose one per payload
 * shape they fire:
 *
 * ```ts
 * class Kart {
 *     readonly scores = new EventSource(scoreRegistry, "kart:1");
 *     constructor() { this.scores.declare("coinCollected"); }
 * }
 * ```
 */
export class EventSource<TId extends ChannelId, T> implements Source<TId, T> {
    private readonly channels: Map<TId, Set<Listener<T>>> = new Map();

    constructor(
        private readonly registry: ChannelRegistry<TId, T>,
        readonly ownerId: string,
    ) {}

    declare(channel: TId): void {
        this.registry.assertChannel(channel);
        if (this.channels.has(channel)) {
            // A reset may have dropped this source; addSource ignores it if still registered.
            this.registry.addSource(channel, this);
            return;
        }

        this.channels.set(channel, new Set());
        if (this.registry.sources(channel).includes(this)) {
            // Registered before declaring: the back-fill was ignored, replay it.
            for (const listener of this.registry.listeners(channel)) {
                this.attach(channel, listener);
            }
            return;
        }
        this.registry.addSource(channel, this);
    }

    declares(channel: TId): boolean {
        return this.channels.has(channel);
    }

    attach(channel: TId, listener: Listener<T>): void {
        const listeners = this.channels.get(channel);
        if (!listeners) {
            this.registry.logger.debug(this.ownerId, "attach ignored: channel not declared", { channel });
            return;
        }
        listeners.add(listener);
    }

    detach(channel: TId, listener: Listener<T>): void {
        this.channels.get(channel)?.delete(listener);
    }

    fire(channel: TId, payload: T): void {
        const listeners = this.channels.get(channel);
        if (!listeners) {
            throw new UndeclaredChannelError(channel, this.ownerId);
        }

        // Snapshot: listeners may register or unregister while being invoked.
        const snapshot = [...listeners];
        if (this.registry.listenerFailure === ListenerFailurePolicy.PROPAGATE) {
            for (const listener of snapshot) {
                listener(payload);
            }
            return;
        }

        for (const listener of snapshot) {
            try {
                listener(payload);
            } catch (err) {
                this.registry.logger.error(this.ownerId, `listener failed on "${channel}"`, {
                    channel,
                    error: err instanceof Error ? err.message : String(err),
                });
            }
        }
    }

    /** Leave every declared channel. The source may declare channels again afterwards. */
    dispose(): void {
        for (const channel of [...this.channels.keys()]) {
            this.registry.removeSource(channel, this);
        }
        this.channels.clear();
    }
}
