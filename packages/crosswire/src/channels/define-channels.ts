import { isString } from "es-toolkit";
import type { ChannelId, ChannelSet } from "./types";

/**
 * Declares the closed identifier set for a family of channels.
 *
 * @example
 * const ScoreChannels = defineChannels(["coinCollected", "lapCompleted"]);
 * type ScoreChannel = ChannelOf<typeof ScoreChannels>;
 */
export function defineChannels<const TId extends ChannelId>(ids: readonly TId[]): ChannelSet<TId> {
    if (ids.length === 0) {
        throw new Error("defineChannels: at least one channel is required");
    }

    const seen = new Set<string>();
    for (const id of ids) {
        if (!isString(id) || id.trim().length === 0) {
            throw new Error("defineChannels: channel ids must be non-empty strings");
        }
        if (seen.has(id)) {
            throw new Error(`defineChannels: duplicate channel "${id}"`);
        }
        seen.add(id);
    }

    const frozen = Object.freeze([...ids]);
    return Object.freeze({
        ids: frozen,
        has(id: string): id is TId {
            return seen.has(id);
        },
    });
}
