/**
 * config/index.ts
 * Centralized config loader using dotenv.
 */
import * as dotenv from 'dotenv';
dotenv.config();

function list(value: string | undefined): string[] {
    return (value || '')
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean);
}

export const config = {
    discordToken: process.env.DISCORD_TOKEN,
    discordAppId: process.env.DISCORD_APP_ID,
    discordGuildId: process.env.DISCORD_GUILD_ID,
    apiNinjasKey: process.env.API_NINJAS_KEY || '',
    trivia: {
        factsUrl: process.env.TRIVIA_FACTS_URL || 'https://api.api-ninjas.com/v1/facts',
        // Offset of the timezone administrators type schedules in (UTC+8 by default)
        utcOffsetHours: Number(process.env.TRIVIA_UTC_OFFSET_HOURS || 8),
        fetchTimeoutMs: Number(process.env.TRIVIA_FETCH_TIMEOUT_MS || 5000),
        imageUrl: process.env.TRIVIA_IMAGE_URL ||
            'https://cdn.discordapp.com/attachments/972510204505763951/1076388478088122368/image-12.png',
        staffRoleIds: list(process.env.TRIVIA_STAFF_ROLE_IDS),
    },
    dbPath: process.env.DB_PATH || 'trivia.db',
    port: Number(process.env.PORT || 3000),
    logLevel: process.env.LOG_LEVEL || 'info',
};
