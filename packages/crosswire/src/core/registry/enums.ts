export enum ListenerFailurePolicy {
    /** First throwing listener aborts the fire; the error reaches the caller unchanged. */
    PROPAGATE = "propagate",
    /** Failures are logged and the remaining listeners still run. */
    ISOLATE = "isolate",
}
