import { hasExtension } from '../services/imageFetcher';
import { buildErrorEmbed, buildImageEmbed } from '../utils/embeds';
import { CommandDefinition } from './types';

const VIDEO_EXTENSIONS = ['.mp4', '.webm'];

export const susaCommand: CommandDefinition = {
  name: 'susa',
  description: 'Post a random image',
  options: [],
  async execute(ctx, _args, deps) {
    await ctx.beginLoading();
    const url = await deps.images.fetchRandomImage();
    if (!url) {
      await ctx.replyError(buildErrorEmbed("Couldn't fetch an image right now. Try again later."));
      return;
    }
    // embeds can't play video; a bare link gets Discord's own player
    if (hasExtension(url, VIDEO_EXTENSIONS)) {
      await ctx.reply({ content: url, embeds: [] });
      return;
    }
    await ctx.reply({ embeds: [buildImageEmbed(url)] });
  },
};
