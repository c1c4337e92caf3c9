/**
 * trivia/gate.ts
 * Once-per-day decision for the trivia tick, as a pure transition.
 *
 * Phases: idle (nothing configured) -> armed (waiting for, or due at, today's
 * fire time) -> fired (sent today). A new UTC date moves fired back to armed.
 */
import {
    compareTimeOfDay,
    normalizeSchedule,
    timeOfDayUtc,
    utcDateKey,
    type TimeOfDay,
} from './schedule.js';
import type { TriviaConfig } from './types.js';

export interface DispatchState {
    readonly sentToday: boolean;
    /** UTC date (YYYY-MM-DD) of the last successful send. */
    readonly sentDate: string | null;
}

export type DispatchPhase = 'idle' | 'armed' | 'fired';

export type SkipReason = 'unconfigured' | 'too-early' | 'already-sent';

export type TickDecision =
    | { action: 'skip'; reason: SkipReason }
    | { action: 'send'; config: TriviaConfig; fireTime: TimeOfDay; date: string };

export interface TickEvaluation {
    state: DispatchState;
    decision: TickDecision;
}

export const initialDispatchState: DispatchState = { sentToday: false, sentDate: null };

/** Rebuild the state from a persisted send date. */
export function restoreDispatchState(lastSentDate: string | null, now: Date): DispatchState {
    if (!lastSentDate) return initialDispatchState;
    return { sentToday: lastSentDate === utcDateKey(now), sentDate: lastSentDate };
}

export function evaluateTick(
    state: DispatchState,
    now: Date,
    config: TriviaConfig | null,
    utcOffsetHours: number,
): TickEvaluation {
    if (!config) {
        return { state, decision: { action: 'skip', reason: 'unconfigured' } };
    }

    const today = utcDateKey(now);
    let next = state;
    if (state.sentDate !== today && state.sentToday) {
        next = { ...state, sentToday: false };
    }

    const fireTime = normalizeSchedule(config.schedule, utcOffsetHours);
    if (compareTimeOfDay(timeOfDayUtc(now), fireTime) < 0) {
        return { state: next, decision: { action: 'skip', reason: 'too-early' } };
    }

    if (next.sentToday) {
        return { state: next, decision: { action: 'skip', reason: 'already-sent' } };
    }

    return { state: next, decision: { action: 'send', config, fireTime, date: today } };
}

export function markSent(now: Date): DispatchState {
    return { sentToday: true, sentDate: utcDateKey(now) };
}

export function describePhase(state: DispatchState, now: Date, config: TriviaConfig | null): DispatchPhase {
    if (!config) return 'idle';
    return state.sentToday && state.sentDate === utcDateKey(now) ? 'fired' : 'armed';
}
