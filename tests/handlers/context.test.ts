import { describe, it, expect } from 'vitest';
import { MessageFlags, PermissionFlagsBits } from 'discord.js';
import { InteractionContext, PrefixContext } from '../../src/handlers/context';
import { buildErrorEmbed, buildImageEmbed } from '../../src/utils/embeds';
import { createMockInteraction, createMockMessage, firstEmbed } from '../utils/discordMocks';

const admins = { adminUserIds: [], adminRoleIds: [] };

describe('PrefixContext', () => {
  it('replaces the loading placeholder with the reply', async () => {
    const { message, channel, sent } = createMockMessage({ authorId: 'user-a', authorTag: 'alice#0' });
    const ctx = new PrefixContext(message, 'susa', admins);

    await ctx.beginLoading();
    expect(firstEmbed(channel.send.mock.calls[0][0]).description).toBe('⏳ Fetching an image…');

    const image = buildImageEmbed('https://img.example/a.gif');
    const result = await ctx.reply({ embeds: [image] });

    expect(channel.send).toHaveBeenCalledTimes(1);
    expect(sent[0].edit).toHaveBeenCalledWith({ content: null, embeds: [image] });
    expect(result).toBe(sent[0]);
    expect(ctx.user).toEqual({ id: 'user-a', tag: 'alice#0' });
    expect(ctx.surface).toBe('prefix');
  });

  it('sends a new message once the placeholder is used up', async () => {
    const { message, channel } = createMockMessage();
    const ctx = new PrefixContext(message, 'susa', admins);

    await ctx.beginLoading();
    await ctx.reply({ embeds: [buildImageEmbed('https://img.example/a.gif')] });
    await ctx.replyError(buildErrorEmbed());

    expect(channel.send).toHaveBeenCalledTimes(2);
  });

  it('uses the author id for privilege checks', () => {
    const { message } = createMockMessage({ authorId: 'boss' });
    expect(new PrefixContext(message, 'cancel', { adminUserIds: ['boss'], adminRoleIds: [] }).isPrivileged()).toBe(true);
    expect(new PrefixContext(message, 'cancel', admins).isPrivileged()).toBe(false);
  });
});

describe('InteractionContext', () => {
  it('replies and fetches the posted message', async () => {
    const { interaction, state, reply } = createMockInteraction({ commandName: 'raid' });
    const ctx = new InteractionContext(interaction, admins);

    const result = await ctx.reply({ embeds: [buildErrorEmbed('x')] });

    expect(state.reply).toHaveBeenCalledTimes(1);
    expect(result).toBe(reply);
    expect(ctx.commandName).toBe('raid');
    expect(ctx.surface).toBe('slash');
  });

  it('defers while loading and edits the deferred reply', async () => {
    const { interaction, state } = createMockInteraction({ commandName: 'susa' });
    const ctx = new InteractionContext(interaction, admins);
    const image = buildImageEmbed('https://img.example/a.gif');

    await ctx.beginLoading();
    await ctx.beginLoading();
    await ctx.reply({ embeds: [image] });

    expect(state.deferReply).toHaveBeenCalledTimes(1);
    expect(state.editReply).toHaveBeenCalledWith({ embeds: [image] });
    expect(state.reply).not.toHaveBeenCalled();
  });

  it('puts an error into the deferred reply', async () => {
    const { interaction, state } = createMockInteraction({ commandName: 'susa' });
    const ctx = new InteractionContext(interaction, admins);
    const error = buildErrorEmbed();

    await ctx.beginLoading();
    await ctx.replyError(error);

    expect(state.editReply).toHaveBeenCalledWith({ content: '', embeds: [error] });
  });

  it('sends errors ephemerally otherwise', async () => {
    const fresh = createMockInteraction();
    const error = buildErrorEmbed();
    await new InteractionContext(fresh.interaction, admins).replyError(error);
    expect(fresh.state.reply).toHaveBeenCalledWith({ embeds: [error], flags: MessageFlags.Ephemeral });

    const answered = createMockInteraction();
    const ctx = new InteractionContext(answered.interaction, admins);
    await ctx.reply({ embeds: [buildImageEmbed('https://img.example/a.gif')] });
    await ctx.replyError(error);
    expect(answered.state.followUp).toHaveBeenCalledWith({ embeds: [error], flags: MessageFlags.Ephemeral });
  });

  it('checks the raw member permissions', () => {
    const { interaction } = createMockInteraction({
      member: { permissions: PermissionFlagsBits.Administrator.toString(), roles: [] },
    });
    expect(new InteractionContext(interaction, admins).isPrivileged()).toBe(true);
  });
});
