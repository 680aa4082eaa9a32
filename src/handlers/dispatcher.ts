import { ChatInputCommandInteraction, Message } from 'discord.js';
import { logger } from '../logger';
import { AdminLists } from '../utils/admin';
import { buildErrorEmbed, buildNoticeEmbed } from '../utils/embeds';
import { elapsedMs } from '../utils/time';
import {
  formatUsage,
  parsePrefixArguments,
  parsePrefixCommand,
  readInteractionArgs,
} from '../commands/args';
import { CommandArgs, CommandContext, CommandDefinition, CommandDeps } from '../commands/types';
import { InteractionContext, PrefixContext } from './context';

export interface DispatcherOptions extends AdminLists {
  prefix: string;
}

export class CommandDispatcher {
  private readonly commands = new Map<string, CommandDefinition>();

  constructor(
    definitions: readonly CommandDefinition[],
    private readonly deps: CommandDeps,
    private readonly options: DispatcherOptions
  ) {
    for (const def of definitions) {
      if (this.commands.has(def.name)) {
        throw new Error(`Duplicate command: ${def.name}`);
      }
      this.commands.set(def.name, def);
    }
  }

  get(name: string): CommandDefinition | undefined {
    return this.commands.get(name);
  }

  async handleInteraction(interaction: ChatInputCommandInteraction): Promise<void> {
    const def = this.commands.get(interaction.commandName);
    if (!def) {
      logger.warn('Unknown slash command', { command: interaction.commandName, user: interaction.user.tag });
      return;
    }
    const ctx = new InteractionContext(interaction, this.options);
    await this.dispatch(def, ctx, readInteractionArgs(interaction.options, def));
  }

  async handleMessage(message: Message): Promise<void> {
    if (message.author.bot) return;
    const invocation = parsePrefixCommand(message.content, this.options.prefix);
    if (!invocation) return;
    const def = this.commands.get(invocation.name);
    if (!def) return;

    const ctx = new PrefixContext(message, def.name, this.options);
    const parsed = parsePrefixArguments(def.options, invocation.rest);
    if (!parsed.ok) {
      logger.info('Prefix command missing argument', { command: def.name, user: ctx.user.tag, missing: parsed.missing });
      try {
        await ctx.reply({
          embeds: [buildNoticeEmbed('warning', '⚠️ Missing argument', `Usage: \`${formatUsage(this.options.prefix, def)}\``)],
        });
      } catch (e) {
        logger.error('Failed to send usage message', e, { command: def.name, user: ctx.user.tag });
      }
      return;
    }
    await this.dispatch(def, ctx, parsed.args);
  }

  /**
   * Runs a command behind the error boundary. Never rejects.
   */
  async dispatch(def: CommandDefinition, ctx: CommandContext, args: CommandArgs): Promise<void> {
    const context = { command: def.name, user: ctx.user.tag, userId: ctx.user.id, surface: ctx.surface };
    const startedAt = Date.now();
    logger.info('Command invoked', context);

    try {
      await def.execute(ctx, args, this.deps);
      logger.info('Command completed', { ...context, ms: elapsedMs(startedAt) });
    } catch (e) {
      logger.error(`Command ${def.name} failed`, e, context);
      try {
        await ctx.replyError(buildErrorEmbed(`An error occurred while processing the ${def.name} command.`));
      } catch (replyErr) {
        logger.error('Failed to send error message', replyErr, context);
      }
    }
  }
}
