import type { ChannelId } from "../../channels/types";
import type { LogHandler, LogLevel } from "../logger/types";
import type { Source } from "../source/types";
import type { Listener } from "../types";
import type { ListenerFailurePolicy } from "./enums";

export type RegistryConfig = {
    /** Defaults to {@link ListenerFailurePolicy.PROPAGATE}. */
    listenerFailure?: ListenerFailurePolicy;
    logger?: {
        handlers?: LogHandler[];
        /** Install the console handler. Defaults to `true`. */
        console?: boolean;
        /** Defaults to `"warn"`. */
        level?: LogLevel;
    };
};

export type ChannelEntry<TId extends ChannelId, T> = {
    readonly sources: Set<Source<TId, T>>;
    readonly listeners: Set<Listener<T>>;
};
