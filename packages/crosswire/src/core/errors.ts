/** Raised when an operation names a channel outside the registry's {@link ChannelSet}. */
export class UnknownChannelError extends Error {
    override readonly name = "UnknownChannelError";

    constructor(readonly channel: string) {
        super(`Unknown channel "${channel}": not part of the registry's channel set`);
    }
}

/** Raised when a source is asked to fire a channel it never declared. */
export class UndeclaredChannelError extends Error {
    override readonly name = "UndeclaredChannelError";

    constructor(
        readonly channel: string,
        readonly ownerId: string,
    ) {
        super(`Source "${ownerId}" cannot fire "${channel}": channel was not declared`);
    }
}
