import type { Client, Message } from 'discord.js';
import type { Notifier } from '../scheduler/types';

const MAX_MESSAGE_LENGTH = 1900;

export interface DiscordTransport extends Notifier {
  sendDirectMessage: (userId: string, text: string) => Promise<void>;
  reply: (message: Message, text: string) => Promise<void>;
  client: Client;
}

export function chunkText(text: string, max: number = MAX_MESSAGE_LENGTH): string[] {
  if (text.length <= max) return [text];
  const chunks: string[] = [];
  let remaining = text;
  while (remaining.length > 0) {
    if (remaining.length <= max) {
      chunks.push(remaining);
      break;
    }
    let cut = remaining.lastIndexOf('\n', max);
    if (cut < max * 0.5) cut = max;
    chunks.push(remaining.slice(0, cut));
    remaining = remaining.slice(cut).replace(/^\n/, '');
  }
  return chunks;
}

export function createDiscordTransport(client: Client): DiscordTransport {
  return {
    async sendDirectMessage(userId, text) {
      const user = await client.users.fetch(userId);
      for (const chunk of chunkText(text)) {
        await user.send(chunk);
      }
    },

    async reply(message, text) {
      for (const chunk of chunkText(text)) {
        await message.reply(chunk);
      }
    },

    client,
  };
}
