import 'dotenv/config';
import {
  Client,
  GatewayIntentBits,
  Events,
  REST,
  Routes,
  ActivityType,
} from 'discord.js';
import { BotConfig, loadConfig } from './config';
import { loadRaidData } from './raidData';
import { EventRegistry } from './store';
import { ImageFetcher } from './services/imageFetcher';
import { decorateMessage } from './utils/reactions';
import { commands, buildSlashCommands } from './commands';
import { CommandDispatcher } from './handlers/dispatcher';
import { logger } from './logger';
import { RaidData } from './types';

let config: BotConfig;
let raidData: RaidData;
try {
  config = loadConfig();
  raidData = loadRaidData(config.raidDataPath);
} catch (e) {
  logger.error('Startup configuration failed', e);
  process.exit(1);
}

process.on('uncaughtException', (err) => {
  logger.error('Uncaught Exception', err);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', reason);
});

logger.info('Raid data loaded', {
  roster: raidData.roster.length,
  reactions: raidData.reactions.length,
  path: config.raidDataPath,
});

const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent,
  ],
  presence: {
    activities: [{ name: config.statusActivity, type: ActivityType.Watching }],
  },
});

const dispatcher = new CommandDispatcher(
  commands,
  {
    registry: new EventRegistry(),
    raidData,
    prefix: config.prefix,
    images: new ImageFetcher(),
    decorate: (message, emojis) => decorateMessage(message, emojis),
  },
  {
    prefix: config.prefix,
    adminUserIds: config.adminUserIds,
    adminRoleIds: config.adminRoleIds,
  }
);

client.once(Events.ClientReady, async (c) => {
  logger.info('Bot logged in', { tag: c.user.tag, id: c.user.id, guilds: c.guilds.cache.size });

  const rest = new REST().setToken(config.token);
  const body = buildSlashCommands(commands);
  const applicationId = config.clientId || c.user.id;
  try {
    if (config.guildId) {
      await rest.put(Routes.applicationGuildCommands(applicationId, config.guildId), { body });
      logger.info('Slash commands synced to guild', { guildId: config.guildId, count: body.length });
    } else {
      await rest.put(Routes.applicationCommands(applicationId), { body });
      logger.info('Slash commands synced globally', { count: body.length });
    }
  } catch (e) {
    logger.error('Failed to sync slash commands', e);
  }
});

client.on(Events.InteractionCreate, async (interaction) => {
  if (!interaction.isChatInputCommand()) return;
  await dispatcher.handleInteraction(interaction);
});

client.on(Events.MessageCreate, async (message) => {
  await dispatcher.handleMessage(message);
});

client.on(Events.Error, (err) => {
  logger.error('Discord client error', err);
});

function shutdown(signal: string): void {
  logger.info('Shutdown requested', { signal });
  client
    .destroy()
    .catch((e: unknown) => logger.error('Error while closing the client', e))
    .finally(() => process.exit(0));
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));

logger.info('Starting raid bot');
client.login(config.token).catch((e: unknown) => {
  logger.error('Login failed', e);
  process.exit(1);
});
