import { APIEmbedField, EmbedBuilder, embedLength } from 'discord.js';
import {
  COLORS,
  DEFAULT_ENTRY_EMOJI,
  EMBED_FIELD_LIMIT,
  EMBED_FIELD_NAME_LIMIT,
  EMBED_MAX_FIELDS,
  EMBED_TOTAL_LIMIT,
  PARTICIPANT_PREVIEW,
} from '../constants';
import { InfoDisplay, ParticipantEmojiMap, RosterEntry, ScheduledEvent } from '../types';

export type NoticeKind = 'success' | 'warning' | 'error';

const NOTICE_COLORS: Record<NoticeKind, number> = {
  success: COLORS.green,
  warning: COLORS.yellow,
  error: COLORS.red,
};

function clampField(value: string, limit = EMBED_FIELD_LIMIT): string {
  if (value.length <= limit) return value;
  return value.slice(0, limit - 1) + '…';
}

export function formatRosterLine(entry: RosterEntry, emojiMap: ParticipantEmojiMap = {}): string {
  const emoji = emojiMap[entry.name] ?? DEFAULT_ENTRY_EMOJI;
  return `${emoji} ${entry.name} - ${entry.role}`;
}

export function buildRosterEmbed(roster: readonly RosterEntry[], emojiMap: ParticipantEmojiMap = {}): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(COLORS.red)
    .setTitle('⚔️ Raid Participants')
    .setDescription('Ready for battle!');

  if (roster.length === 0) {
    embed.addFields({
      name: 'No Participants',
      value: 'No raid participants configured.',
      inline: false,
    });
  } else {
    embed.addFields({
      name: 'Participants',
      value: clampField(roster.map((e) => formatRosterLine(e, emojiMap)).join('\n')),
      inline: false,
    });
  }

  embed.setFooter({ text: `Total participants: ${roster.length}` });
  return embed;
}

/**
 * Mentions for the first few participants, then "(+N more)".
 */
export function summarizeParticipants(ids: readonly string[]): string {
  if (ids.length === 0) return 'None yet';
  const shown = ids.slice(0, PARTICIPANT_PREVIEW).map((id) => `<@${id}>`).join(', ');
  const rest = ids.length - PARTICIPANT_PREVIEW;
  return rest > 0 ? `${shown} (+${rest} more)` : shown;
}

export function buildEventEmbed(event: ScheduledEvent, prefix = '!', title = '📅 Raid Scheduled'): EmbedBuilder {
  const fields: { name: string; value: string; inline: boolean }[] = [
    { name: 'Name', value: clampField(event.name), inline: true },
    { name: 'Time', value: clampField(event.time), inline: true },
    { name: 'ID', value: `\`${event.id}\``, inline: true },
  ];
  if (event.description) {
    fields.push({ name: 'Description', value: clampField(event.description), inline: false });
  }
  fields.push({ name: 'Creator', value: `<@${event.creatorId}>`, inline: true });
  fields.push({
    name: `Participants (${event.participants.length})`,
    value: summarizeParticipants(event.participants),
    inline: false,
  });

  return new EmbedBuilder()
    .setColor(COLORS.blue)
    .setTitle(title)
    .addFields(fields)
    .setFooter({ text: `Join with ${prefix}join ${event.id} or /join` });
}

function eventListField(e: ScheduledEvent): APIEmbedField {
  const lines = [`**Time:** ${e.time}`];
  if (e.description) lines.push(`**Description:** ${e.description}`);
  lines.push(`**Creator:** <@${e.creatorId}>`);
  lines.push(`**Participants (${e.participants.length}):** ${summarizeParticipants(e.participants)}`);

  // truncate the name, never the id
  const idSuffix = ` (ID: ${e.id})`;
  return {
    name: clampField(e.name, EMBED_FIELD_NAME_LIMIT - idSuffix.length) + idSuffix,
    value: clampField(lines.join('\n')),
    inline: false,
  };
}

/**
 * One field per raid, up to Discord's field count and total size limits.
 * Raids that don't fit are counted in the footer.
 */
export function buildEventListEmbed(events: readonly ScheduledEvent[]): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(COLORS.blue)
    .setTitle('📋 Scheduled Raids');

  if (events.length === 0) {
    return embed.setDescription('No raids scheduled.');
  }

  const longestFooter = `Total raids: ${events.length} (showing ${events.length})`;
  let budget = EMBED_TOTAL_LIMIT - embedLength(embed.data) - longestFooter.length;
  const fields: APIEmbedField[] = [];
  for (const e of events) {
    if (fields.length >= EMBED_MAX_FIELDS) break;
    const field = eventListField(e);
    const size = field.name.length + field.value.length;
    if (size > budget) break;
    budget -= size;
    fields.push(field);
  }

  if (fields.length > 0) embed.addFields(fields);
  embed.setFooter({
    text:
      fields.length < events.length
        ? `Total raids: ${events.length} (showing ${fields.length})`
        : `Total raids: ${events.length}`,
  });
  return embed;
}

export function buildInfoEmbed(info: InfoDisplay): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(COLORS.purple)
    .setTitle(info.title)
    .setDescription(info.description);
  if (info.fields.length > 0) {
    embed.addFields(info.fields.map((f) => ({ name: f.name, value: clampField(f.value), inline: false })));
  }
  return embed;
}

export function buildImageEmbed(url: string): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(COLORS.purple)
    .setTitle('🎲 Random pick')
    .setImage(url);
}

export function buildLoadingEmbed(): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(COLORS.grey)
    .setDescription('⏳ Fetching an image…');
}

export function buildNoticeEmbed(kind: NoticeKind, title: string, description: string): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(NOTICE_COLORS[kind])
    .setTitle(title)
    .setDescription(description);
}

export function buildErrorEmbed(description = 'An error occurred while processing the command.'): EmbedBuilder {
  return buildNoticeEmbed('error', '❌ Error', description);
}
