import { logger } from '../logger';
import { buildEventEmbed, buildEventListEmbed, buildNoticeEmbed } from '../utils/embeds';
import { CommandDefinition, requireArg } from './types';

const idOption = { name: 'id', description: 'Raid ID', required: true };

function notFound(id: string) {
  return buildNoticeEmbed('error', '❌ Not found', `No scheduled raid with ID \`${id}\`.`);
}

export const scheduleCommand: CommandDefinition = {
  name: 'schedule',
  description: 'Schedule a raid that others can join',
  options: [
    { name: 'name', description: 'Raid name', required: true },
    { name: 'time', description: 'When it starts, e.g. 20:00', required: true },
    { name: 'description', description: 'Extra details', required: false, rest: true },
  ],
  async execute(ctx, args, deps) {
    const event = await deps.registry.create({
      name: requireArg(args, 'name'),
      time: requireArg(args, 'time'),
      description: args.description,
      creatorId: ctx.user.id,
      creatorTag: ctx.user.tag,
    });
    logger.info('Raid scheduled', { id: event.id, name: event.name, creator: ctx.user.tag });
    await ctx.reply({ embeds: [buildEventEmbed(event, deps.prefix)] });
  },
};

export const joinCommand: CommandDefinition = {
  name: 'join',
  description: 'Join a scheduled raid',
  options: [idOption],
  async execute(ctx, args, deps) {
    const id = requireArg(args, 'id');
    const outcome = await deps.registry.join(id, ctx.user.id);
    switch (outcome.status) {
      case 'not_found':
        await ctx.reply({ embeds: [notFound(id)] });
        return;
      case 'already_joined':
        await ctx.reply({
          embeds: [buildNoticeEmbed('warning', '⚠️ Already joined', `You are already signed up for **${outcome.event.name}**.`)],
        });
        return;
      case 'joined':
        await ctx.reply({
          embeds: [
            buildNoticeEmbed(
              'success',
              '✅ Joined',
              `You joined **${outcome.event.name}** (${outcome.event.time}). Participants: ${outcome.event.participants.length}.`
            ),
          ],
        });
        return;
    }
  },
};

export const leaveCommand: CommandDefinition = {
  name: 'leave',
  description: 'Leave a scheduled raid',
  options: [idOption],
  async execute(ctx, args, deps) {
    const id = requireArg(args, 'id');
    const outcome = await deps.registry.leave(id, ctx.user.id);
    switch (outcome.status) {
      case 'not_found':
        await ctx.reply({ embeds: [notFound(id)] });
        return;
      case 'not_joined':
        await ctx.reply({
          embeds: [buildNoticeEmbed('warning', '⚠️ Not participating', `You are not signed up for **${outcome.event.name}**.`)],
        });
        return;
      case 'left':
        await ctx.reply({
          embeds: [buildNoticeEmbed('success', '👋 Left', `You left **${outcome.event.name}**.`)],
        });
        return;
    }
  },
};

export const cancelCommand: CommandDefinition = {
  name: 'cancel',
  description: 'Cancel a raid you scheduled',
  options: [idOption],
  async execute(ctx, args, deps) {
    const id = requireArg(args, 'id');
    const outcome = await deps.registry.cancel(id, ctx.user.id, ctx.isPrivileged());
    switch (outcome.status) {
      case 'not_found':
        await ctx.reply({ embeds: [notFound(id)] });
        return;
      case 'forbidden':
        await ctx.reply({
          embeds: [buildNoticeEmbed('error', '⛔ Not allowed', 'Only the creator or an admin can cancel this raid.')],
        });
        return;
      case 'cancelled':
        logger.info('Raid cancelled', { id, by: ctx.user.tag, participants: outcome.participantCount });
        await ctx.reply({
          embeds: [
            buildNoticeEmbed(
              'success',
              '🗑️ Raid cancelled',
              `**${outcome.event.name}** was cancelled. Participants signed up: ${outcome.participantCount}.`
            ),
          ],
        });
        return;
    }
  },
};

export const raidsCommand: CommandDefinition = {
  name: 'raids',
  description: 'List scheduled raids',
  options: [],
  async execute(ctx, _args, deps) {
    const events = await deps.registry.list();
    await ctx.reply({ embeds: [buildEventListEmbed(events)] });
  },
};
