import { describe, it, expect, vi } from 'vitest';

const cronMock = vi.hoisted(() => ({ schedule: vi.fn() }));
vi.mock('node-cron', () => ({ default: cronMock }));

import { startScheduler, TICK_EXPRESSION } from '../src/scheduler/index.js';

describe('startScheduler', () => {
    it('ticks the dispatcher every minute in UTC', async () => {
        const task = { stop: vi.fn() };
        cronMock.schedule.mockReturnValueOnce(task);
        const dispatcher = { tick: vi.fn(async () => ({ outcome: 'sent' })) };

        expect(startScheduler(dispatcher)).toBe(task);
        expect(cronMock.schedule).toHaveBeenCalledWith(TICK_EXPRESSION, expect.any(Function), { timezone: 'Etc/UTC' });
        expect(TICK_EXPRESSION).toBe('* * * * *');

        const onTick = cronMock.schedule.mock.calls[0][1];
        onTick();
        expect(dispatcher.tick).toHaveBeenCalledTimes(1);
    });

    it('survives a rejected tick', async () => {
        cronMock.schedule.mockReturnValueOnce({ stop: vi.fn() });
        const dispatcher = { tick: vi.fn(async () => { throw new Error('boom'); }) };
        startScheduler(dispatcher);

        const onTick = cronMock.schedule.mock.calls[cronMock.schedule.mock.calls.length - 1][1];
        expect(() => onTick()).not.toThrow();
        await vi.waitFor(() => expect(dispatcher.tick).toHaveBeenCalledTimes(1));
    });
});
