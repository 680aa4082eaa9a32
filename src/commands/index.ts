import { RESTPostAPIChatInputApplicationCommandsJSONBody, SlashCommandBuilder } from 'discord.js';
import { cotrCommand, wipeCommand } from './info';
import { raidCommand } from './raid';
import {
  cancelCommand,
  joinCommand,
  leaveCommand,
  raidsCommand,
  scheduleCommand,
} from './schedule';
import { susaCommand } from './susa';
import { CommandDefinition } from './types';

export const commands: readonly CommandDefinition[] = [
  raidCommand,
  wipeCommand,
  cotrCommand,
  susaCommand,
  scheduleCommand,
  joinCommand,
  leaveCommand,
  cancelCommand,
  raidsCommand,
];

export function buildSlashCommand(definition: CommandDefinition): SlashCommandBuilder {
  const builder = new SlashCommandBuilder()
    .setName(definition.name)
    .setDescription(definition.description);
  for (const option of definition.options) {
    builder.addStringOption((opt) =>
      opt.setName(option.name).setDescription(option.description).setRequired(option.required)
    );
  }
  return builder;
}

export function buildSlashCommands(
  definitions: readonly CommandDefinition[] = commands
): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return definitions.map((d) => buildSlashCommand(d).toJSON());
}
