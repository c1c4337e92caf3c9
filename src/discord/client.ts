import { Client, GatewayIntentBits } from 'discord.js';

export function createDiscordClient(): Client {
    // Slash commands and channel lookups need no privileged intents
    return new Client({ intents: [GatewayIntentBits.Guilds] });
}
