import type { ChannelId } from "../../channels/types";
import type { Listener } from "../types";

/**
 * Participation contract for anything that can fire channels.
 *
 * Implemented by composition: a participant holds an {@link EventSource}
 * (or its own implementation) instead of extending a base class.
 * The registry only ever calls `attach` and `detach`.
 */
export interface Source<TId extends ChannelId, T> {
    /** Opt into `channel` and receive every listener already waiting on it. */
    declare(channel: TId): void;
    /** Add a listener for a declared channel. Undeclared channels are ignored. */
    attach(channel: TId, listener: Listener<T>): void;
    /** Remove a listener. No-op when absent. */
    detach(channel: TId, listener: Listener<T>): void;
    /** Synchronously invoke every attached listener in registration order. */
    fire(channel: TId, payload: T): void;
}
