/**
 * trivia/types.ts
 * Shapes shared between the dispatcher, the store and the chat platform.
 */

export interface TriviaConfig {
    readonly channelId: string;
    /** Local time of day, HH:MM in 24-hour format. */
    readonly schedule: string;
}

export interface TriviaConfigSource {
    current(): TriviaConfig | null;
}

/** Where the date of the last successful send survives a restart. */
export interface DispatchLog {
    lastSentDate(): string | null;
    recordSent(date: string): void;
}

export interface FactSource {
    /** Resolves with a single fact or rejects with a FetchError. */
    fetchFact(): Promise<string>;
}

export interface TriviaChannel {
    readonly id: string;
    sendFact(fact: string): Promise<void>;
    sendNotice(text: string): Promise<void>;
}

export interface Notifier {
    /** Resolves with null when the channel is gone or cannot be posted to. */
    resolveChannel(channelId: string): Promise<TriviaChannel | null>;
}
