/**
 * trivia/facts.ts
 * Client for the API Ninjas facts endpoint.
 */
import fetch from 'node-fetch';
import logger from '../utils/logger.js';
import { FetchError, errorMessage } from '../utils/errors.js';
import type { FactSource } from './types.js';

export interface FactsClientOptions {
    apiKey: string;
    url: string;
    timeoutMs: number;
}

/**
 * Pull the fact text out of the API payload, expected as `[{ "fact": "..." }]`.
 */
export function extractFact(payload: unknown): string {
    if (!Array.isArray(payload) || payload.length === 0) {
        throw new FetchError('Facts API returned no facts');
    }
    const first: unknown = payload[0];
    if (typeof first !== 'object' || first === null || !('fact' in first) || typeof first.fact !== 'string') {
        throw new FetchError('Facts API returned a fact without text');
    }
    const fact = first.fact.trim();
    if (!fact) {
        throw new FetchError('Facts API returned an empty fact');
    }
    return fact;
}

/** Settle with `work`, or reject as soon as `signal` aborts, whichever comes first. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(new Error('aborted'));
        work.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            },
        );
        if (signal.aborted) {
            onAbort();
            return;
        }
        signal.addEventListener('abort', onAbort, { once: true });
    });
}

export class FactsClient implements FactSource {
    constructor(private readonly options: FactsClientOptions) { }

    /** The timeout covers the whole exchange, headers and body. */
    async fetchFact(): Promise<string> {
        const { apiKey, url, timeoutMs } = this.options;
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), timeoutMs);

        try {
            const res = await this.step(
                fetch(url, { headers: { 'X-Api-Key': apiKey }, signal: controller.signal }),
                controller.signal,
                'Facts API request failed',
            );
            logger.debug(`[Facts] API response status: ${res.status}`);
            if (res.status !== 200) {
                throw new FetchError(`Facts API responded with status ${res.status}`, res.status);
            }

            const payload: unknown = await this.step(res.json(), controller.signal, 'Facts API returned malformed JSON');
            return extractFact(payload);
        } finally {
            clearTimeout(timer);
        }
    }

    private async step<T>(work: Promise<T>, signal: AbortSignal, failure: string): Promise<T> {
        try {
            return await untilAborted(work, signal);
        } catch (error) {
            if (signal.aborted) {
                throw new FetchError(`Facts API request failed: request timed out after ${this.options.timeoutMs}ms`);
            }
            throw new FetchError(`${failure}: ${errorMessage(error)}`);
        }
    }
}
