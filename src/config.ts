import * as path from 'path';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface BotConfig {
  token: string;
  clientId?: string;
  guildId?: string;
  prefix: string;
  adminUserIds: string[];
  adminRoleIds: string[];
  statusActivity: string;
  raidDataPath: string;
}

export const DEFAULT_RAID_DATA_PATH = path.join(__dirname, '..', 'data', 'raid.json');

function splitIds(raw: string | undefined): string[] {
  return (raw || '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function optional(raw: string | undefined): string | undefined {
  const v = raw?.trim();
  return v ? v : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const token = optional(env.DISCORD_BOT_TOKEN);
  if (!token) {
    throw new ConfigError('DISCORD_BOT_TOKEN is not set. Put the bot token in .env or the environment.');
  }

  const prefix = optional(env.COMMAND_PREFIX) ?? '!';
  if (/\s/.test(prefix)) {
    throw new ConfigError(`COMMAND_PREFIX must not contain whitespace (got "${prefix}")`);
  }

  return {
    token,
    clientId: optional(env.DISCORD_CLIENT_ID),
    guildId: optional(env.DISCORD_GUILD_ID),
    prefix,
    adminUserIds: splitIds(env.DISCORD_ADMIN_USER_IDS),
    adminRoleIds: splitIds(env.DISCORD_ADMIN_ROLE_IDS),
    statusActivity: optional(env.BOT_STATUS_ACTIVITY) ?? 'for /raid commands',
    raidDataPath: optional(env.RAID_DATA_PATH) ?? DEFAULT_RAID_DATA_PATH,
  };
}
