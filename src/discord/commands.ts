import { ChannelType, PermissionFlagsBits, SlashCommandBuilder } from 'discord.js';

export const commands = [
    new SlashCommandBuilder()
        .setName('trivia')
        .setDescription('Daily trivia settings')
        .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
        .addSubcommand((sub) =>
            sub
                .setName('setup')
                .setDescription('Setup the trivia')
                .addChannelOption((opt) =>
                    opt
                        .setName('channel')
                        .setDescription('Channel to send the trivia to')
                        .addChannelTypes(ChannelType.GuildText)
                        .setRequired(true)
                )
                .addStringOption((opt) =>
                    opt
                        .setName('schedule')
                        .setDescription('Schedule of the trivia session in 24 hour format ex. 12:00')
                        .setRequired(true)
                )
        )
        .addSubcommand((sub) =>
            sub
                .setName('channel')
                .setDescription('Set the trivia channel')
                .addChannelOption((opt) =>
                    opt
                        .setName('channel')
                        .setDescription('Channel to send the trivia to')
                        .addChannelTypes(ChannelType.GuildText)
                        .setRequired(true)
                )
        )
        .addSubcommand((sub) =>
            sub
                .setName('schedule')
                .setDescription('Schedule the trivia')
                .addStringOption((opt) =>
                    opt
                        .setName('schedule')
                        .setDescription('Schedule of the trivia in 24 hour format ex. 12:00')
                        .setRequired(true)
                )
        )
        .addSubcommand((sub) => sub.setName('config').setDescription('Get the trivia config')),
];

export const commandsJson = commands.map((cmd) => cmd.toJSON());
