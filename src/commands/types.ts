import { EmbedBuilder } from 'discord.js';
import { EventRegistry } from '../store';
import { RaidData } from '../types';
import { DecorateResult, Reactable } from '../utils/reactions';

export type Surface = 'slash' | 'prefix';

export interface ReplyPayload {
  content?: string;
  embeds: EmbedBuilder[];
}

/**
 * What a command sees of the invocation, independent of whether it came in as
 * a slash command or a prefix message.
 */
export interface CommandContext {
  readonly commandName: string;
  readonly surface: Surface;
  readonly user: { id: string; tag: string };
  /** Sends the main response and returns the posted message. */
  reply(payload: ReplyPayload): Promise<Reactable>;
  /** Slash: defers the reply. Prefix: posts a placeholder that the next reply replaces. */
  beginLoading(): Promise<void>;
  replyError(embed: EmbedBuilder): Promise<void>;
  isPrivileged(): boolean;
}

export interface CommandOption {
  name: string;
  description: string;
  required: boolean;
  /** Prefix surface only: take all remaining text. Must be the last option. */
  rest?: boolean;
}

export type CommandArgs = Record<string, string | undefined>;

export interface CommandDeps {
  registry: EventRegistry;
  raidData: RaidData;
  /** Prefix of the text surface, shown in usage hints. */
  prefix: string;
  images: { fetchRandomImage(): Promise<string | null> };
  decorate(message: Reactable, emojis: readonly string[]): Promise<DecorateResult>;
}

export interface CommandDefinition {
  name: string;
  description: string;
  options: CommandOption[];
  execute(ctx: CommandContext, args: CommandArgs, deps: CommandDeps): Promise<void>;
}

export function requireArg(args: CommandArgs, name: string): string {
  const value = args[name];
  if (value === undefined || value === '') {
    throw new Error(`Missing required argument: ${name}`);
  }
  return value;
}
