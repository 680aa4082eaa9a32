import { vi } from 'vitest';
import type { ChatInputCommandInteraction, EmbedBuilder, Message } from 'discord.js';
import type { CommandContext, CommandDeps, ReplyPayload, Surface } from '../../src/commands/types';
import { EventRegistry } from '../../src/store';
import type { RaidData } from '../../src/types';

export interface MockMessageOptions {
  id?: string;
  content?: string;
  authorId?: string;
  authorTag?: string;
  bot?: boolean;
  member?: unknown;
}

/**
 * Minimal Message: channel.send resolves to a fresh sent message whose edit
 * resolves to itself.
 */
export function createMockMessage(options: MockMessageOptions = {}) {
  const sent: ReturnType<typeof createSentMessage>[] = [];
  const channel = {
    id: 'channel-1',
    send: vi.fn(async (_payload: ReplyPayload) => {
      const m = createSentMessage(`sent-${sent.length + 1}`);
      sent.push(m);
      return m;
    }),
  };
  const message = {
    id: options.id ?? 'message-1',
    content: options.content ?? '',
    channelId: channel.id,
    channel,
    author: {
      id: options.authorId ?? 'user-1',
      tag: options.authorTag ?? 'tester#0',
      bot: options.bot ?? false,
    },
    member: options.member ?? null,
  };
  return { message: message as unknown as Message, channel, sent };
}

export function createSentMessage(id = 'sent-1') {
  const msg = {
    id,
    react: vi.fn().mockResolvedValue(undefined),
    edit: vi.fn(),
  };
  msg.edit.mockResolvedValue(msg);
  return msg;
}

export interface MockInteractionOptions {
  commandName?: string;
  userId?: string;
  userTag?: string;
  strings?: Record<string, string>;
  member?: unknown;
}

/**
 * Minimal ChatInputCommandInteraction that tracks deferred/replied like the
 * real one does.
 */
export function createMockInteraction(options: MockInteractionOptions = {}) {
  const reply = createSentMessage('reply-1');
  const flags = { deferred: false, replied: false };
  const state = {
    commandName: options.commandName ?? 'raid',
    user: { id: options.userId ?? 'user-1', tag: options.userTag ?? 'tester#0' },
    member: options.member ?? null,
    get deferred() {
      return flags.deferred;
    },
    get replied() {
      return flags.replied;
    },
    options: {
      getString: vi.fn((name: string) => options.strings?.[name] ?? null),
    },
    reply: vi.fn(async () => {
      flags.replied = true;
    }),
    deferReply: vi.fn(async () => {
      flags.deferred = true;
    }),
    editReply: vi.fn(async () => {
      flags.replied = true;
      return reply;
    }),
    followUp: vi.fn(async () => createSentMessage('followup-1')),
    fetchReply: vi.fn(async () => reply),
  };
  return { interaction: state as unknown as ChatInputCommandInteraction, state, flags, reply };
}

/** CommandContext fake that records every response. */
export function createMockContext(options: { userId?: string; userTag?: string; privileged?: boolean; surface?: Surface } = {}) {
  const sent = createSentMessage('ctx-reply');
  const ctx = {
    commandName: 'test',
    surface: options.surface ?? 'prefix',
    user: { id: options.userId ?? 'user-1', tag: options.userTag ?? 'tester#0' },
    reply: vi.fn(async (_payload: ReplyPayload) => sent),
    beginLoading: vi.fn(async () => undefined),
    replyError: vi.fn(async (_embed: EmbedBuilder) => undefined),
    isPrivileged: vi.fn(() => options.privileged ?? false),
  } satisfies CommandContext;
  return { ctx, sent };
}

export const testRaidData: RaidData = {
  roster: [
    { name: 'Ana Test', role: 'Tank' },
    { name: 'Bo Test', role: 'Healer' },
  ],
  reactions: ['⚔️', '🛡️'],
  emojis: { 'Ana Test': '🛡️' },
  info: {
    wipe: { title: 'Wipe', description: 'Regroup.', fields: [{ name: 'Step', value: 'Run back.' }] },
    cotr: { title: 'Code', description: 'Rules.', fields: [] },
  },
};

export function createDeps(overrides: Partial<CommandDeps> = {}): CommandDeps {
  return {
    registry: new EventRegistry(),
    raidData: testRaidData,
    prefix: '!',
    images: { fetchRandomImage: vi.fn(async () => null) },
    decorate: vi.fn(async () => ({ added: 0, failed: [] })),
    ...overrides,
  };
}

export function firstEmbed(payload: ReplyPayload | undefined) {
  const embed = payload?.embeds[0];
  if (!embed) throw new Error('expected an embed');
  return embed.data;
}
