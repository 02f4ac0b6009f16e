import type { ChannelId, ChannelSet } from "../../channels/types";
import { ChannelRegistry } from "./registry";
import type { RegistryConfig } from "./types";

/**
 * Creates a {@link ChannelRegistry} for one payload shape.
 *
 * @example
 * const scores = createRegistry<ScoreChannel, number>(ScoreChannels, { logger: { level: "debug" } });
 */
export function createRegistry<TId extends ChannelId, T>(
    channels: ChannelSet<TId>,
    config?: RegistryConfig,
): ChannelRegistry<TId, T> {
    return new ChannelRegistry<TId, T>(channels, config);
}
