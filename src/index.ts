/**
 * src/index.ts
 * Main entry: Discord login, /trivia commands, daily trivia scheduler, health endpoint.
 */
import { Events } from 'discord.js';
import type { Server } from 'http';
import type { ScheduledTask } from 'node-cron';
import { config } from './config/index.js';
import logger from './utils/logger.js';
import { openDatabase } from './db/index.js';
import { createDiscordClient } from './discord/client.js';
import { handleTriviaInteraction } from './discord/interactions.js';
import { DiscordNotifier } from './discord/notifier.js';
import { startScheduler } from './scheduler/index.js';
import { createHealthApp } from './server/health.js';
import { staffAuthorizer, TriviaCommands } from './trivia/commands.js';
import { TriviaDispatcher } from './trivia/dispatcher.js';
import { FactsClient } from './trivia/facts.js';
import { TriviaStore } from './trivia/store.js';

async function main() {
    if (!config.discordToken) {
        throw new Error('DISCORD_TOKEN is not set');
    }
    if (!config.apiNinjasKey) {
        logger.warn('[Config] API_NINJAS_KEY is not set, fact requests will be rejected');
    }

    const db = openDatabase(config.dbPath);
    const store = new TriviaStore(db);
    const client = createDiscordClient();

    const dispatcher = new TriviaDispatcher({
        store,
        facts: new FactsClient({
            apiKey: config.apiNinjasKey,
            url: config.trivia.factsUrl,
            timeoutMs: config.trivia.fetchTimeoutMs,
        }),
        notifier: new DiscordNotifier(client, config.trivia.imageUrl),
        utcOffsetHours: config.trivia.utcOffsetHours,
    });
    const handlers = new TriviaCommands(store, dispatcher).authorized(staffAuthorizer(config.trivia.staffRoleIds));

    client.on(Events.InteractionCreate, (interaction) => {
        if (!interaction.isChatInputCommand() || interaction.commandName !== 'trivia') return;
        handleTriviaInteraction(handlers, interaction).catch((error: unknown) => {
            logger.error({ err: error }, '[Discord] Replying to trivia command failed');
        });
    });

    let scheduler: ScheduledTask | null = null;
    client.once(Events.ClientReady, (ready) => {
        logger.info(`[Discord] Logged in as ${ready.user.tag}`);
        scheduler = startScheduler(dispatcher);
    });

    const app = createHealthApp({ db, dispatcher });
    const server: Server = app.listen(config.port, () => {
        logger.info(`Server running on :${config.port}`);
    });

    const shutdown = (signal: string) => {
        logger.info(`[Main] ${signal} received, shutting down`);
        scheduler?.stop();
        server.close();
        client.destroy()
            .catch((error: unknown) => logger.error({ err: error }, '[Discord] Disconnect failed'))
            .finally(() => {
                db.close();
                process.exit(0);
            });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    await client.login(config.discordToken);
}

process.on('unhandledRejection', (reason) => {
    logger.error({ err: reason }, '[Main] Unhandled promise rejection');
});

main().catch((error: unknown) => {
    logger.error({ err: error }, '[Main] Startup failed');
    process.exit(1);
});
