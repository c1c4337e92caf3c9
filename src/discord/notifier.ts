/**
 * discord/notifier.ts
 * Posts trivia to Discord channels.
 */
import type { MessageCreateOptions } from 'discord.js';
import { DeliveryError, errorMessage } from '../utils/errors.js';
import type { Notifier, TriviaChannel } from '../trivia/types.js';
import { buildFactEmbed } from './embeds.js';

export interface SendableChannel {
    id: string;
    send(message: string | MessageCreateOptions): Promise<unknown>;
}

export interface FetchedChannel {
    isSendable(): this is SendableChannel;
}

/** The slice of a discord.js Client used to look channels up. */
export interface ChannelClient {
    channels: {
        fetch(channelId: string): Promise<FetchedChannel | null>;
    };
}

export class DiscordNotifier implements Notifier {
    constructor(
        private readonly client: ChannelClient,
        private readonly imageUrl: string,
    ) { }

    async resolveChannel(channelId: string): Promise<TriviaChannel | null> {
        const channel = await this.client.channels.fetch(channelId);
        if (!channel || !channel.isSendable()) {
            return null;
        }

        const post = async (message: string | MessageCreateOptions): Promise<void> => {
            try {
                await channel.send(message);
            } catch (error) {
                throw new DeliveryError(`Posting to channel ${channelId} failed: ${errorMessage(error)}`, channelId);
            }
        };

        return {
            id: channel.id,
            sendFact: (fact) => post({ embeds: [buildFactEmbed(fact, this.imageUrl)] }),
            sendNotice: (text) => post(text),
        };
    }
}
