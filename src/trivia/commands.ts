/**
 * trivia/commands.ts
 * Administrative trivia commands, independent of the chat platform.
 */
import logger from '../utils/logger.js';
import { INVALID_SCHEDULE_MESSAGE, isValidSchedule } from './schedule.js';
import type { DispatcherStatus } from './dispatcher.js';
import type { TriviaStore } from './store.js';

export const SETUP_FIRST_MESSAGE = 'Please setup the trivia first, use /trivia setup.';
export const ALREADY_SETUP_MESSAGE =
    'Trivia is already setup, use /trivia channel and /trivia schedule to change the channel and schedule.';
export const PERMISSION_DENIED_MESSAGE = 'You do not have permission to use this command.';

export interface ConfigView {
    channelId: string;
    schedule: string;
    utcOffset: string;
    fireTimeUtc: string | null;
    phase: DispatcherStatus['phase'];
    sentDate: string | null;
}

export type CommandReply =
    | { ok: false; content: string }
    | { ok: true; content: string; view?: ConfigView };

export interface TriviaCaller {
    userId: string;
    /** The caller can manage the server. */
    isAdmin: boolean;
    roleIds: string[];
}

export type Authorizer = (caller: TriviaCaller) => boolean;

export function staffAuthorizer(staffRoleIds: string[]): Authorizer {
    const staff = new Set(staffRoleIds);
    return (caller) => caller.isAdmin || caller.roleIds.some((id) => staff.has(id));
}

/** Put an authorization check in front of a command handler. */
export function withAuthorization<A extends unknown[]>(
    authorize: Authorizer,
    handler: (...args: A) => CommandReply,
): (caller: TriviaCaller, ...args: A) => CommandReply {
    return (caller, ...args) => {
        if (!authorize(caller)) {
            logger.warn({ userId: caller.userId }, '[Trivia] Unauthorized trivia command');
            return { ok: false, content: PERMISSION_DENIED_MESSAGE };
        }
        return handler(...args);
    };
}

export interface StatusSource {
    status(now?: Date): DispatcherStatus;
}

export class TriviaCommands {
    constructor(
        private readonly store: TriviaStore,
        private readonly dispatcher: StatusSource,
    ) { }

    setup(channelId: string, schedule: string): CommandReply {
        if (this.store.current()) {
            return { ok: false, content: ALREADY_SETUP_MESSAGE };
        }
        if (!isValidSchedule(schedule)) {
            return { ok: false, content: INVALID_SCHEDULE_MESSAGE };
        }

        this.store.insert({ channelId, schedule });
        logger.info({ channelId, schedule }, '[Trivia] Trivia set up');
        return { ok: true, content: 'Trivia setup' };
    }

    updateSchedule(schedule: string): CommandReply {
        if (!this.store.current()) {
            return { ok: false, content: SETUP_FIRST_MESSAGE };
        }
        if (!isValidSchedule(schedule)) {
            return { ok: false, content: INVALID_SCHEDULE_MESSAGE };
        }

        this.store.update({ schedule });
        logger.info({ schedule }, '[Trivia] Trivia schedule updated');
        return { ok: true, content: `Trivia session scheduled at ${schedule}` };
    }

    updateChannel(channelId: string): CommandReply {
        if (!this.store.current()) {
            return { ok: false, content: SETUP_FIRST_MESSAGE };
        }

        this.store.update({ channelId });
        logger.info({ channelId }, '[Trivia] Trivia channel updated');
        return { ok: true, content: 'Trivia channel set' };
    }

    getConfig(): CommandReply {
        const config = this.store.current();
        if (!config) {
            return { ok: false, content: SETUP_FIRST_MESSAGE };
        }

        const status = this.dispatcher.status();
        return {
            ok: true,
            content: 'Trivia Config',
            view: {
                channelId: config.channelId,
                schedule: config.schedule,
                utcOffset: status.utcOffset,
                fireTimeUtc: status.fireTimeUtc,
                phase: status.phase,
                sentDate: status.sentDate,
            },
        };
    }

    /** The four handlers, each behind the given authorizer. */
    authorized(authorize: Authorizer) {
        return {
            setup: withAuthorization(authorize, (channelId: string, schedule: string) => this.setup(channelId, schedule)),
            schedule: withAuthorization(authorize, (schedule: string) => this.updateSchedule(schedule)),
            channel: withAuthorization(authorize, (channelId: string) => this.updateChannel(channelId)),
            config: withAuthorization(authorize, () => this.getConfig()),
        };
    }
}

export type AuthorizedTriviaCommands = ReturnType<TriviaCommands['authorized']>;
