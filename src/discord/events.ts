import type { Client } from 'discord.js';
import { Events } from 'discord.js';
import { respondToMessage, type CommandContext } from '../commands';
import { logJson } from '../log';
import type { DiscordTransport } from './transport';

export interface AppContext {
  commands: CommandContext;
  transport: DiscordTransport;
}

export function registerEventHandlers(client: Client, ctx: AppContext) {
  client.on(Events.MessageCreate, async (message) => {
    if (message.author.bot) return;

    let response: string | null;
    try {
      response = await respondToMessage(ctx.commands, message.author.id, message.content);
    } catch (err) {
      console.error('[Commands] Failed to handle command:', err);
      logJson({ event: 'command_error', user: message.author.id, error: String(err) });
      response = `Error: ${err instanceof Error ? err.message : String(err)}`;
    }
    if (response === null) return;

    try {
      await ctx.transport.reply(message, response);
    } catch (err) {
      console.error('[Commands] Failed to send reply:', err);
      logJson({ event: 'reply_error', user: message.author.id, error: String(err) });
    }
  });
}
