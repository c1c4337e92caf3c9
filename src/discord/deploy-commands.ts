/**
 * discord/deploy-commands.ts
 * Registers the /trivia slash command. Guild scoped when DISCORD_GUILD_ID is set.
 */
import { REST, Routes } from 'discord.js';
import { config } from '../config/index.js';
import logger from '../utils/logger.js';
import { commandsJson } from './commands.js';

async function deploy(): Promise<void> {
    const { discordToken: token, discordAppId: appId, discordGuildId: guildId } = config;

    if (!token || !appId) {
        throw new Error('Missing DISCORD_TOKEN or DISCORD_APP_ID');
    }

    const rest = new REST({ version: '10' }).setToken(token);
    logger.info(`[Discord] Deploying ${commandsJson.length} commands...`);

    if (guildId) {
        await rest.put(Routes.applicationGuildCommands(appId, guildId), { body: commandsJson });
        logger.info(`[Discord] Deployed to guild ${guildId}`);
    } else {
        await rest.put(Routes.applicationCommands(appId), { body: commandsJson });
        logger.info('[Discord] Deployed globally');
    }
}

deploy().catch((error: unknown) => {
    logger.error({ err: error }, '[Discord] Command deployment failed');
    process.exit(1);
});
