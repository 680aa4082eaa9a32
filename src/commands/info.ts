import { buildInfoEmbed } from '../utils/embeds';
import { CommandDefinition } from './types';

export const wipeCommand: CommandDefinition = {
  name: 'wipe',
  description: 'What to do after a raid wipe',
  options: [],
  async execute(ctx, _args, deps) {
    await ctx.reply({ embeds: [buildInfoEmbed(deps.raidData.info.wipe)] });
  },
};

export const cotrCommand: CommandDefinition = {
  name: 'cotr',
  description: 'Show the code of the raid',
  options: [],
  async execute(ctx, _args, deps) {
    await ctx.reply({ embeds: [buildInfoEmbed(deps.raidData.info.cotr)] });
  },
};
