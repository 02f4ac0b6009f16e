export type ChannelId = string;

/**
 * Closed set of channel identifiers shared by every participant of one registry.
 *
 * Built once at module load by {@link defineChannels}; extending it means
 * editing the declaration, not calling into a registry.
 */
export interface ChannelSet<TId extends ChannelId = ChannelId> {
    /** Identifiers in declaration order. */
    readonly ids: readonly TId[];
    has(id: string): id is TId;
}

/** Extract the identifier union from a {@link ChannelSet}. */
export type ChannelOf<S> = S extends ChannelSet<infer TId> ? TId : never;
