/**
 * trivia/store.ts
 * Persistence of the trivia config row.
 *
 * The current config is kept as a frozen snapshot that every write replaces
 * wholesale, so readers never see a half-updated config.
 */
import type { TriviaDatabase } from '../db/index.js';
import { ConfigurationMissingError } from '../utils/errors.js';
import type { DispatchLog, TriviaConfig, TriviaConfigSource } from './types.js';

interface TriviaConfigRow {
    channel_id: string;
    schedule: string;
    last_sent_date: string | null;
}

export class TriviaStore implements TriviaConfigSource, DispatchLog {
    private snapshot: TriviaConfig | null;

    constructor(private readonly db: TriviaDatabase) {
        const row = this.readRow();
        this.snapshot = row ? freeze(row) : null;
    }

    current(): TriviaConfig | null {
        return this.snapshot;
    }

    /** Inserts the config. Fails if one already exists. */
    insert(config: TriviaConfig): TriviaConfig {
        this.db.prepare(
            'INSERT INTO trivia_config (id, channel_id, schedule, updated_at) VALUES (1, ?, ?, CURRENT_TIMESTAMP)'
        ).run(config.channelId, config.schedule);
        return this.publish();
    }

    update(patch: Partial<TriviaConfig>): TriviaConfig {
        const current = this.snapshot;
        if (!current) {
            throw new ConfigurationMissingError();
        }
        const next = { ...current, ...patch };
        this.db.prepare(
            'UPDATE trivia_config SET channel_id = ?, schedule = ?, updated_at = CURRENT_TIMESTAMP WHERE id = 1'
        ).run(next.channelId, next.schedule);
        return this.publish();
    }

    lastSentDate(): string | null {
        return this.readRow()?.last_sent_date ?? null;
    }

    recordSent(date: string): void {
        this.db.prepare('UPDATE trivia_config SET last_sent_date = ? WHERE id = 1').run(date);
    }

    private publish(): TriviaConfig {
        const row = this.readRow();
        if (!row) {
            throw new ConfigurationMissingError('Trivia config row disappeared after write');
        }
        const config = freeze(row);
        this.snapshot = config;
        return config;
    }

    private readRow(): TriviaConfigRow | undefined {
        return this.db.prepare<[], TriviaConfigRow>(
            'SELECT channel_id, schedule, last_sent_date FROM trivia_config WHERE id = 1'
        ).get();
    }
}

function freeze(row: TriviaConfigRow): TriviaConfig {
    return Object.freeze({ channelId: row.channel_id, schedule: row.schedule });
}
