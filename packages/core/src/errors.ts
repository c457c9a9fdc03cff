/**
 * @srvdeck/core — Error Types
 *
 * Command failures are data (ExecutionResult.error), not exceptions.
 * These classes cover the other failure kinds: bad configuration caught
 * before anything is queued, providers that cannot build a plan, the
 * command log, and the monitoring endpoint.
 */

/** Invalid input rejected before any command is enqueued. */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/** A command provider could not produce a plan (unknown service, unsupported OS). */
export class ProviderError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ProviderError';
    }
}

export class CommandLogError extends Error {
    constructor(message: string, readonly path: string) {
        super(message);
        this.name = 'CommandLogError';
    }
}

export class MonitoringUnavailableError extends Error {
    constructor(message: string, readonly endpoint: string) {
        super(message);
        this.name = 'MonitoringUnavailableError';
    }
}
