/**
 * discord/interactions.ts
 * Routes /trivia slash commands to the trivia handlers. Replies are ephemeral.
 *
 * Only the parts of ChatInputCommandInteraction the routing reads are named
 * here, so a real interaction or a stub can be passed in.
 */
import { MessageFlags, PermissionFlagsBits, type EmbedBuilder } from 'discord.js';
import logger from '../utils/logger.js';
import type { AuthorizedTriviaCommands, CommandReply, TriviaCaller } from '../trivia/commands.js';
import { buildConfigEmbed } from './embeds.js';

/** A guild member's roles: raw ids from the API, or the cached role manager. */
type MemberRoles = string[] | { cache: { keys(): Iterable<string> } };

export interface CallerSource {
    user: { id: string };
    member: { roles: MemberRoles } | null;
    memberPermissions: { has(permission: bigint): boolean } | null;
}

export interface TriviaInteraction extends CallerSource {
    options: {
        getSubcommand(): string;
        getChannel(name: string, required: true): { id: string };
        getString(name: string, required: true): string;
    };
    reply(options: { content?: string; embeds?: EmbedBuilder[]; flags: MessageFlags.Ephemeral }): Promise<unknown>;
}

export function callerFromInteraction(interaction: CallerSource): TriviaCaller {
    const roles = interaction.member?.roles;
    let roleIds: string[] = [];
    if (Array.isArray(roles)) {
        roleIds = roles;
    } else if (roles) {
        roleIds = [...roles.cache.keys()];
    }

    return {
        userId: interaction.user.id,
        isAdmin: interaction.memberPermissions?.has(PermissionFlagsBits.ManageGuild) ?? false,
        roleIds,
    };
}

export function runTriviaCommand(
    handlers: AuthorizedTriviaCommands,
    interaction: TriviaInteraction,
): CommandReply {
    const caller = callerFromInteraction(interaction);
    const subcommand = interaction.options.getSubcommand();

    switch (subcommand) {
        case 'setup':
            return handlers.setup(
                caller,
                interaction.options.getChannel('channel', true).id,
                interaction.options.getString('schedule', true).trim(),
            );
        case 'channel':
            return handlers.channel(caller, interaction.options.getChannel('channel', true).id);
        case 'schedule':
            return handlers.schedule(caller, interaction.options.getString('schedule', true).trim());
        case 'config':
            return handlers.config(caller);
        default:
            return { ok: false, content: `Unknown trivia command: ${subcommand}` };
    }
}

export async function handleTriviaInteraction(
    handlers: AuthorizedTriviaCommands,
    interaction: TriviaInteraction,
): Promise<void> {
    let reply: CommandReply;
    try {
        reply = runTriviaCommand(handlers, interaction);
    } catch (error) {
        logger.error({ err: error }, '[Discord] Trivia command failed');
        reply = { ok: false, content: 'Something went wrong while running this command.' };
    }

    if (reply.ok && reply.view) {
        await interaction.reply({ embeds: [buildConfigEmbed(reply.view)], flags: MessageFlags.Ephemeral });
        return;
    }
    await interaction.reply({ content: reply.content, flags: MessageFlags.Ephemeral });
}
