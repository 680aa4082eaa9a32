import { ChatInputCommandInteraction, EmbedBuilder, Message } from 'discord.js';
import { EPHEMERAL } from '../constants';
import { AdminLists, isAdmin } from '../utils/admin';
import { buildLoadingEmbed } from '../utils/embeds';
import { CommandContext, ReplyPayload, Surface } from '../commands/types';

export class InteractionContext implements CommandContext {
  readonly surface: Surface = 'slash';
  readonly commandName: string;
  readonly user: { id: string; tag: string };

  constructor(
    private readonly interaction: ChatInputCommandInteraction,
    private readonly admins: AdminLists
  ) {
    this.commandName = interaction.commandName;
    this.user = { id: interaction.user.id, tag: interaction.user.tag };
  }

  async reply(payload: ReplyPayload): Promise<Message> {
    if (this.interaction.deferred && !this.interaction.replied) {
      return this.interaction.editReply(payload);
    }
    if (this.interaction.replied) {
      return this.interaction.followUp(payload);
    }
    await this.interaction.reply(payload);
    return this.interaction.fetchReply();
  }

  async beginLoading(): Promise<void> {
    if (this.interaction.deferred || this.interaction.replied) return;
    await this.interaction.deferReply();
  }

  async replyError(embed: EmbedBuilder): Promise<void> {
    if (this.interaction.deferred && !this.interaction.replied) {
      // a deferred reply can't become ephemeral any more
      await this.interaction.editReply({ content: '', embeds: [embed] });
      return;
    }
    if (this.interaction.replied) {
      await this.interaction.followUp({ embeds: [embed], flags: EPHEMERAL });
      return;
    }
    await this.interaction.reply({ embeds: [embed], flags: EPHEMERAL });
  }

  isPrivileged(): boolean {
    return isAdmin(this.interaction.member, this.interaction.user.id, this.admins);
  }
}

export class PrefixContext implements CommandContext {
  readonly surface: Surface = 'prefix';
  readonly user: { id: string; tag: string };
  private placeholder: Message | null = null;

  constructor(
    private readonly message: Message,
    readonly commandName: string,
    private readonly admins: AdminLists
  ) {
    this.user = { id: message.author.id, tag: message.author.tag };
  }

  private async send(payload: ReplyPayload): Promise<Message> {
    const channel = this.message.channel;
    if (!('send' in channel)) {
      throw new Error(`Channel ${this.message.channelId} does not accept messages`);
    }
    return channel.send(payload);
  }

  async reply(payload: ReplyPayload): Promise<Message> {
    const placeholder = this.placeholder;
    if (placeholder) {
      this.placeholder = null;
      return placeholder.edit({ content: payload.content ?? null, embeds: payload.embeds });
    }
    return this.send(payload);
  }

  async beginLoading(): Promise<void> {
    if (this.placeholder) return;
    this.placeholder = await this.send({ embeds: [buildLoadingEmbed()] });
  }

  async replyError(embed: EmbedBuilder): Promise<void> {
    await this.reply({ embeds: [embed] });
  }

  isPrivileged(): boolean {
    return isAdmin(this.message.member, this.message.author.id, this.admins);
  }
}
