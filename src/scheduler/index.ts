/**
 * scheduler/index.ts
 * node-cron timer driving the trivia tick once per minute (UTC).
 */
import cron, { type ScheduledTask } from 'node-cron';
import logger from '../utils/logger.js';

export const TICK_EXPRESSION = '* * * * *';

export interface Tickable {
    tick(now?: Date): Promise<unknown>;
}

export function startScheduler(dispatcher: Tickable): ScheduledTask {
    const task = cron.schedule(TICK_EXPRESSION, () => {
        dispatcher.tick().catch((error: unknown) => {
            logger.error({ err: error }, '[Scheduler] Trivia tick failed');
        });
    }, {
        timezone: 'Etc/UTC'
    });

    logger.info('[Scheduler] Trivia tick scheduled every minute');
    return task;
}
