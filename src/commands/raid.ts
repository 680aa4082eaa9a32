import { buildRosterEmbed } from '../utils/embeds';
import { CommandDefinition } from './types';

export const raidCommand: CommandDefinition = {
  name: 'raid',
  description: 'Display raid participants and add reactions',
  options: [],
  async execute(ctx, _args, deps) {
    const { roster, emojis, reactions } = deps.raidData;
    const message = await ctx.reply({ embeds: [buildRosterEmbed(roster, emojis)] });
    await deps.decorate(message, reactions);
  },
};
