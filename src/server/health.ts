/**
 * server/health.ts
 * Express app exposing the health check for production.
 */
import express, { type Express } from 'express';
import { isDatabaseHealthy, type TriviaDatabase } from '../db/index.js';
import type { StatusSource } from '../trivia/commands.js';
import type { DispatcherStatus } from '../trivia/dispatcher.js';
import logger from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export interface HealthDeps {
    db: TriviaDatabase;
    dispatcher: StatusSource;
}

export type HealthReport =
    | {
        status: 'healthy';
        timestamp: string;
        database: 'connected' | 'disconnected';
        trivia: DispatcherStatus;
    }
    | { status: 'unhealthy'; timestamp: string; error: string };

export function buildHealthReport(deps: HealthDeps, now: Date = new Date()): HealthReport {
    try {
        return {
            status: 'healthy',
            timestamp: now.toISOString(),
            database: isDatabaseHealthy(deps.db) ? 'connected' : 'disconnected',
            trivia: deps.dispatcher.status(now),
        };
    } catch (error) {
        logger.error({ err: error }, '[Health] Health check failed');
        return { status: 'unhealthy', timestamp: now.toISOString(), error: errorMessage(error) };
    }
}

export function createHealthApp(deps: HealthDeps): Express {
    const app = express();

    app.get('/health', (_req, res) => {
        const report = buildHealthReport(deps);
        res.status(report.status === 'healthy' ? 200 : 500).json(report);
    });

    app.get('/', (_req, res) => res.send('Daily trivia bot is running!'));

    return app;
}
