import { describe, it, expect, vi } from 'vitest';
import { DiscordNotifier, type SendableChannel } from '../src/discord/notifier.js';
import { DeliveryError } from '../src/utils/errors.js';

class StubChannel {
    readonly send = vi.fn(async (_message: unknown): Promise<unknown> => undefined);

    constructor(readonly id: string, private readonly sendable: boolean) { }

    isSendable(): this is SendableChannel {
        return this.sendable;
    }
}

function clientWith(channel: StubChannel | null) {
    return { channels: { fetch: vi.fn(async (_channelId: string) => channel) } };
}

const IMAGE = 'https://images.example.test/trivia.png';

describe('DiscordNotifier', () => {
    it('resolves nothing for a missing channel', async () => {
        const client = clientWith(null);
        await expect(new DiscordNotifier(client, IMAGE).resolveChannel('404')).resolves.toBeNull();
        expect(client.channels.fetch).toHaveBeenCalledWith('404');
    });

    it('resolves nothing for a channel it cannot post to', async () => {
        const notifier = new DiscordNotifier(clientWith(new StubChannel('500', false)), IMAGE);
        await expect(notifier.resolveChannel('500')).resolves.toBeNull();
    });

    it('posts the fact as an embed and notices as plain text', async () => {
        const channel = new StubChannel('42', true);
        const resolved = await new DiscordNotifier(clientWith(channel), IMAGE).resolveChannel('42');
        expect(resolved?.id).toBe('42');

        await resolved?.sendFact('Bees can fly.');
        await resolved?.sendNotice('An error occurred while fetching trivia. Error code: 503');

        expect(channel.send).toHaveBeenCalledTimes(2);
        expect(channel.send.mock.calls[0][0]).toMatchObject({ embeds: [{ data: {
            title: 'Trivia of the Day',
            description: 'Bees can fly.',
            color: 0x5865f2,
            image: { url: IMAGE },
        } }] });
        expect(channel.send.mock.calls[1][0]).toBe('An error occurred while fetching trivia. Error code: 503');
    });

    it('turns a failed post into a DeliveryError', async () => {
        const channel = new StubChannel('42', true);
        channel.send.mockRejectedValueOnce(new Error('Missing Permissions'));
        const resolved = await new DiscordNotifier(clientWith(channel), IMAGE).resolveChannel('42');

        const error = await resolved?.sendFact('Bees can fly.').catch((e: unknown) => e);
        expect(error).toBeInstanceOf(DeliveryError);
        expect(error).toMatchObject({
            channelId: '42',
            message: 'Posting to channel 42 failed: Missing Permissions',
        });
    });
});
