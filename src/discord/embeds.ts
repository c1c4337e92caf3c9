/**
 * discord/embeds.ts
 * Embeds for the daily fact and the config view.
 */
import { Colors, EmbedBuilder } from 'discord.js';
import type { ConfigView } from '../trivia/commands.js';

export const FACT_TITLE = 'Trivia of the Day';

export function buildFactEmbed(fact: string, imageUrl: string): EmbedBuilder {
    return new EmbedBuilder()
        .setTitle(FACT_TITLE)
        .setDescription(fact)
        .setColor(Colors.Blurple)
        .setImage(imageUrl);
}

const PHASE_LABELS: Record<ConfigView['phase'], string> = {
    idle: 'Not configured',
    armed: 'Waiting for today\'s trivia',
    fired: 'Sent today',
};

export function buildConfigEmbed(view: ConfigView): EmbedBuilder {
    const lines = [
        `Channel: <#${view.channelId}>`,
        `Schedule: ${view.schedule} (${view.utcOffset})`,
    ];
    if (view.fireTimeUtc) lines.push(`Fires at: ${view.fireTimeUtc} UTC`);
    lines.push(`Status: ${PHASE_LABELS[view.phase]}`);
    if (view.sentDate) lines.push(`Last sent: ${view.sentDate}`);

    return new EmbedBuilder()
        .setTitle('Trivia Config')
        .setDescription(lines.join('\n'))
        .setColor(Colors.Blurple);
}
