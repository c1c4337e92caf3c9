import { describe, it, expect, vi, beforeEach } from 'vitest';

const fetchMock = vi.hoisted(() => vi.fn());
vi.mock('node-fetch', () => ({ default: fetchMock }));

import { FactsClient, extractFact } from '../src/trivia/facts.js';
import { TriviaDispatcher } from '../src/trivia/dispatcher.js';
import { FetchError } from '../src/utils/errors.js';
import type { TriviaChannel } from '../src/trivia/types.js';

function response(status: number, body: unknown) {
    return {
        status,
        json: async () => body,
    };
}

const client = new FactsClient({
    apiKey: 'test-key',
    url: 'https://facts.example.test/v1/facts',
    timeoutMs: 50,
});

describe('FactsClient', () => {
    beforeEach(() => {
        fetchMock.mockReset();
    });

    it('sends the API key and returns the first fact', async () => {
        fetchMock.mockResolvedValueOnce(response(200, [{ fact: 'Bees can fly.' }, { fact: 'ignored' }]));

        await expect(client.fetchFact()).resolves.toBe('Bees can fly.');
        expect(fetchMock).toHaveBeenCalledTimes(1);
        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe('https://facts.example.test/v1/facts');
        expect(init.headers).toEqual({ 'X-Api-Key': 'test-key' });
    });

    it('keeps the status code of a non-200 response', async () => {
        fetchMock.mockResolvedValueOnce(response(502, { error: 'bad gateway' }));

        const error = await client.fetchFact().catch((e: unknown) => e);
        expect(error).toBeInstanceOf(FetchError);
        expect(error).toMatchObject({ status: 502, message: 'Facts API responded with status 502' });
    });

    it('wraps transport failures', async () => {
        fetchMock.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND facts.example.test'));

        const error = await client.fetchFact().catch((e: unknown) => e);
        expect(error).toBeInstanceOf(FetchError);
        expect(error).toMatchObject({
            status: undefined,
            message: 'Facts API request failed: getaddrinfo ENOTFOUND facts.example.test',
        });
    });

    it('times out a hanging request', async () => {
        fetchMock.mockImplementationOnce((_url: string, init: { signal: AbortSignal }) =>
            new Promise((_resolve, reject) => {
                init.signal.addEventListener('abort', () => reject(new Error('The operation was aborted.')));
            })
        );

        await expect(client.fetchFact()).rejects.toThrow('Facts API request failed: request timed out after 50ms');
    });

    it('times out a response whose body never arrives', async () => {
        fetchMock.mockImplementationOnce(async (_url: string, init: { signal: AbortSignal }) => ({
            status: 200,
            json: () => new Promise((_resolve, reject) => {
                init.signal.addEventListener('abort', () => reject(new Error('The operation was aborted.')));
            }),
        }));

        await expect(client.fetchFact()).rejects.toThrow('Facts API request failed: request timed out after 50ms');
    });

    it('times out a stalled body even when the body ignores the abort signal', async () => {
        fetchMock.mockResolvedValueOnce({
            status: 200,
            json: () => new Promise(() => { }),
        });

        await expect(client.fetchFact()).rejects.toThrow('Facts API request failed: request timed out after 50ms');
    });

    it('rejects malformed JSON', async () => {
        fetchMock.mockResolvedValueOnce({
            status: 200,
            json: async () => { throw new SyntaxError('Unexpected token < in JSON at position 0'); },
        });

        await expect(client.fetchFact()).rejects.toThrow(
            'Facts API returned malformed JSON: Unexpected token < in JSON at position 0'
        );
    });
});

describe('extractFact', () => {
    it('trims the fact text', () => {
        expect(extractFact([{ fact: '  Honey never spoils. ' }])).toBe('Honey never spoils.');
    });

    it('rejects payloads without a fact', () => {
        expect(() => extractFact([])).toThrow('Facts API returned no facts');
        expect(() => extractFact({ fact: 'not an array' })).toThrow('Facts API returned no facts');
        expect(() => extractFact([{ text: 'wrong field' }])).toThrow('Facts API returned a fact without text');
        expect(() => extractFact([null])).toThrow('Facts API returned a fact without text');
        expect(() => extractFact([{ fact: '   ' }])).toThrow('Facts API returned an empty fact');
    });
});

describe('FactsClient inside the dispatcher', () => {
    beforeEach(() => {
        fetchMock.mockReset();
    });

    it('settles a tick with a stalled body so later ticks still run', async () => {
        fetchMock
            .mockResolvedValueOnce({ status: 200, json: () => new Promise(() => { }) })
            .mockResolvedValueOnce(response(200, [{ fact: 'Bees can fly.' }]));
        const posted: string[] = [];
        const notices: string[] = [];
        const channel: TriviaChannel = {
            id: '42',
            sendFact: async (fact) => { posted.push(fact); },
            sendNotice: async (text) => { notices.push(text); },
        };
        const dispatcher = new TriviaDispatcher({
            store: { current: () => ({ channelId: '42', schedule: '09:00' }), lastSentDate: () => null, recordSent: () => { } },
            facts: client,
            notifier: { resolveChannel: async () => channel },
            utcOffsetHours: 8,
            clock: () => new Date('2026-03-10T00:00:00Z'),
        });

        expect(await dispatcher.tick(new Date('2026-03-10T01:00:00Z'))).toEqual({ outcome: 'fetch-failed' });
        expect(notices).toEqual([
            'An error occurred while fetching trivia. Facts API request failed: request timed out after 50ms',
        ]);
        expect(await dispatcher.tick(new Date('2026-03-10T01:05:00Z'))).toEqual({ outcome: 'sent' });
        expect(posted).toEqual(['Bees can fly.']);
    });
});
