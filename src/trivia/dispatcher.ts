/**
 * trivia/dispatcher.ts
 * Runs the trivia tick: asks the gate whether today's fact is due, then
 * fetches it and posts it to the configured channel.
 *
 * Failures leave the day unsent so the next tick retries; nothing thrown
 * inside a tick escapes `tick()`.
 */
import logger from '../utils/logger.js';
import { DeliveryError, FetchError, errorMessage } from '../utils/errors.js';
import {
    describePhase,
    evaluateTick,
    markSent,
    restoreDispatchState,
    type DispatchPhase,
    type DispatchState,
    type SkipReason,
} from './gate.js';
import { assertUtcOffset, formatTimeOfDay, formatUtcOffset, normalizeSchedule } from './schedule.js';
import type {
    DispatchLog,
    FactSource,
    Notifier,
    TriviaChannel,
    TriviaConfig,
    TriviaConfigSource,
} from './types.js';

export interface DispatcherDeps {
    store: TriviaConfigSource & DispatchLog;
    facts: FactSource;
    notifier: Notifier;
    utcOffsetHours: number;
    clock?: () => Date;
}

export type TickResult =
    | { outcome: 'skipped'; reason: SkipReason }
    | { outcome: 'busy' | 'channel-unavailable' | 'fetch-failed' | 'delivery-failed' | 'sent' | 'error' };

export interface DispatcherStatus {
    configured: boolean;
    phase: DispatchPhase;
    schedule: string | null;
    utcOffset: string;
    fireTimeUtc: string | null;
    sentDate: string | null;
}

export function fetchErrorNotice(error: FetchError): string {
    return error.status !== undefined
        ? `An error occurred while fetching trivia. Error code: ${error.status}`
        : `An error occurred while fetching trivia. ${error.message}`;
}

export class TriviaDispatcher {
    private state: DispatchState;
    private inFlight = false;
    private readonly clock: () => Date;

    constructor(private readonly deps: DispatcherDeps) {
        assertUtcOffset(deps.utcOffsetHours);
        this.clock = deps.clock ?? (() => new Date());
        this.state = restoreDispatchState(deps.store.lastSentDate(), this.clock());
    }

    get dispatchState(): DispatchState {
        return this.state;
    }

    status(now: Date = this.clock()): DispatcherStatus {
        const config = this.deps.store.current();
        return {
            configured: config !== null,
            phase: describePhase(this.state, now, config),
            schedule: config?.schedule ?? null,
            utcOffset: formatUtcOffset(this.deps.utcOffsetHours),
            fireTimeUtc: config ? formatTimeOfDay(normalizeSchedule(config.schedule, this.deps.utcOffsetHours)) : null,
            sentDate: this.state.sentDate,
        };
    }

    async tick(now: Date = this.clock()): Promise<TickResult> {
        if (this.inFlight) {
            logger.warn('[Trivia] Previous tick still running, skipping this one');
            return { outcome: 'busy' };
        }

        this.inFlight = true;
        try {
            return await this.runTick(now);
        } catch (error) {
            logger.error({ err: error }, '[Trivia] Tick failed');
            return { outcome: 'error' };
        } finally {
            this.inFlight = false;
        }
    }

    private async runTick(now: Date): Promise<TickResult> {
        const { state, decision } = evaluateTick(this.state, now, this.deps.store.current(), this.deps.utcOffsetHours);
        this.state = state;

        if (decision.action === 'skip') {
            return { outcome: 'skipped', reason: decision.reason };
        }

        logger.info({ date: decision.date, fireTimeUtc: formatTimeOfDay(decision.fireTime) }, '[Trivia] Sending trivia of the day');
        return this.send(decision.config, now);
    }

    private async send(config: TriviaConfig, now: Date): Promise<TickResult> {
        const channel = await this.resolveChannel(config.channelId);
        if (!channel) {
            return { outcome: 'channel-unavailable' };
        }

        let fact: string;
        try {
            fact = await this.deps.facts.fetchFact();
        } catch (error) {
            const fetchError = error instanceof FetchError ? error : new FetchError(errorMessage(error));
            logger.warn({ status: fetchError.status }, `[Trivia] Fetching trivia failed: ${fetchError.message}`);
            await this.postNotice(channel, fetchErrorNotice(fetchError));
            return { outcome: 'fetch-failed' };
        }

        try {
            await channel.sendFact(fact);
        } catch (error) {
            const channelId = error instanceof DeliveryError ? error.channelId : channel.id;
            logger.error({ err: error, channelId }, '[Trivia] Posting trivia failed, will retry next tick');
            return { outcome: 'delivery-failed' };
        }

        this.state = markSent(now);
        this.persistSent(now);
        logger.info({ channelId: channel.id, date: this.state.sentDate }, '[Trivia] Trivia of the day sent');
        return { outcome: 'sent' };
    }

    private async resolveChannel(channelId: string): Promise<TriviaChannel | null> {
        try {
            const channel = await this.deps.notifier.resolveChannel(channelId);
            if (!channel) {
                logger.warn({ channelId }, '[Trivia] Trivia channel is unavailable, will retry next tick');
            }
            return channel;
        } catch (error) {
            logger.warn({ err: error, channelId }, '[Trivia] Resolving trivia channel failed, will retry next tick');
            return null;
        }
    }

    private async postNotice(channel: TriviaChannel, text: string): Promise<void> {
        try {
            await channel.sendNotice(text);
        } catch (error) {
            logger.error({ err: error, channelId: channel.id }, '[Trivia] Posting fetch error notice failed');
        }
    }

    private persistSent(now: Date): void {
        const { sentDate } = this.state;
        if (!sentDate) return;
        try {
            this.deps.store.recordSent(sentDate);
        } catch (error) {
            logger.error({ err: error, date: now.toISOString() }, '[Trivia] Recording send date failed');
        }
    }
}
