/**
 * utils/errors.ts
 * Error kinds shared by the trivia commands and the daily dispatcher.
 */

/** Malformed user input, rejected before anything is written. */
export class ValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

/** A command or tick needed the trivia config but none has been set up. */
export class ConfigurationMissingError extends Error {
    constructor(message = 'Trivia has not been set up') {
        super(message);
        this.name = 'ConfigurationMissingError';
    }
}

/**
 * The facts API did not produce a usable fact.
 * `status` is set only when the API answered with a non-200 status code.
 */
export class FetchError extends Error {
    readonly status?: number;

    constructor(message: string, status?: number) {
        super(message);
        this.name = 'FetchError';
        this.status = status;
    }
}

/** The destination channel could not be resolved or written to. */
export class DeliveryError extends Error {
    constructor(message: string, readonly channelId: string) {
        super(message);
        this.name = 'DeliveryError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
