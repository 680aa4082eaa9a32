import * as fs from 'fs';
import { z } from 'zod';
import { ConfigError } from './config';
import { InfoDisplay, RaidData, RosterEntry } from './types';

const infoSchema = z.object({
  title: z.string().min(1),
  description: z.string().min(1),
  fields: z.array(z.object({ name: z.string().min(1), value: z.string().min(1) })),
});

const raidDataSchema = z.object({
  roster: z.array(z.object({ name: z.string(), role: z.string() })),
  reactions: z.array(z.string().min(1)),
  emojis: z.record(z.string()).optional(),
  info: z.object({
    wipe: infoSchema,
    cotr: infoSchema,
  }),
});

export function createRosterEntry(name: string, role: string): RosterEntry {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new ConfigError('Roster entry name must not be empty');
  }
  return Object.freeze({ name: trimmed, role: role.trim() });
}

function freezeInfo(info: InfoDisplay): InfoDisplay {
  return Object.freeze({ ...info, fields: info.fields.map((f) => Object.freeze({ ...f })) });
}

export function parseRaidData(raw: unknown): RaidData {
  const result = raidDataSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.join('.') || '(root)';
    throw new ConfigError(`Invalid raid data at ${where}: ${issue?.message ?? 'unknown error'}`);
  }
  const data = result.data;

  const seen = new Set<string>();
  const roster = data.roster.map((e) => {
    const entry = createRosterEntry(e.name, e.role);
    if (seen.has(entry.name)) {
      throw new ConfigError(`Duplicate roster name: ${entry.name}`);
    }
    seen.add(entry.name);
    return entry;
  });

  return Object.freeze({
    roster: Object.freeze(roster),
    reactions: Object.freeze([...data.reactions]),
    emojis: Object.freeze({ ...data.emojis }),
    info: Object.freeze({
      wipe: freezeInfo(data.info.wipe),
      cotr: freezeInfo(data.info.cotr),
    }),
  });
}

export function loadRaidData(filePath: string): RaidData {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Cannot read raid data from ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseRaidData(raw);
}
