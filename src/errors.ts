/**
 * Errors raised at the edges of fenfeed (configuration and the network).
 * The chunk parser never throws; a bad record is simply dropped.
 */

/** Base error for all fenfeed errors. Includes an error code for programmatic matching. */
export class FenfeedError extends Error {
    readonly code: string;
    constructor(code: string, message: string) {
        super(message);
        this.name = 'FenfeedError';
        this.code = code;
    }
}

/** Thrown when configuration validation fails. */
export class ConfigError extends FenfeedError {
    readonly issues: string[];
    constructor(issues: string[]) {
        super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

/** Thrown when the feed cannot be opened or answers with an error status. */
export class FeedConnectionError extends FenfeedError {
    readonly url: string;
    readonly status?: number;
    constructor(url: string, message: string, status?: number) {
        super('FEED_CONNECTION_ERROR', `[${url}] ${message}`);
        this.name = 'FeedConnectionError';
        this.url = url;
        this.status = status;
    }
}
