import { describe, it, expect } from 'vitest';
import {
  formatUsage,
  parsePrefixArguments,
  parsePrefixCommand,
  readInteractionArgs,
  tokenizeArguments,
} from '../../src/commands/args';
import { scheduleCommand, joinCommand } from '../../src/commands/schedule';

describe('parsePrefixCommand', () => {
  it('splits the command name from the rest', () => {
    expect(parsePrefixCommand('!Join  abc123 ', '!')).toEqual({ name: 'join', rest: 'abc123' });
  });

  it('ignores messages without the prefix or with a gap after it', () => {
    expect(parsePrefixCommand('raid', '!')).toBeNull();
    expect(parsePrefixCommand('! raid', '!')).toBeNull();
    expect(parsePrefixCommand('!', '!')).toBeNull();
  });

  it('supports longer prefixes', () => {
    expect(parsePrefixCommand('rb!raids', 'rb!')).toEqual({ name: 'raids', rest: '' });
  });
});

describe('tokenizeArguments', () => {
  it('groups quoted words', () => {
    expect(tokenizeArguments('"Night Run" 20:00  "bring ammo"')).toEqual(['Night Run', '20:00', 'bring ammo']);
  });

  it('reads an unclosed quote to the end', () => {
    expect(tokenizeArguments('a "b c')).toEqual(['a', 'b c']);
  });
});

describe('parsePrefixArguments', () => {
  it('takes positional arguments and the remaining text', () => {
    const result = parsePrefixArguments(scheduleCommand.options, '"Night Run" 20:00 bring ammo, and potions');
    expect(result).toEqual({
      ok: true,
      args: { name: 'Night Run', time: '20:00', description: 'bring ammo, and potions' },
    });
  });

  it('strips quotes around the trailing text', () => {
    const result = parsePrefixArguments(scheduleCommand.options, '"Night Run" "20:00" "bring ammo"');
    expect(result).toEqual({ ok: true, args: { name: 'Night Run', time: '20:00', description: 'bring ammo' } });
  });

  it('leaves an optional trailing argument undefined', () => {
    const result = parsePrefixArguments(scheduleCommand.options, 'Dawn 06:00');
    expect(result).toEqual({ ok: true, args: { name: 'Dawn', time: '06:00', description: undefined } });
  });

  it('reports the first missing required argument', () => {
    expect(parsePrefixArguments(scheduleCommand.options, 'Dawn')).toEqual({ ok: false, missing: 'time' });
    expect(parsePrefixArguments(joinCommand.options, '')).toEqual({ ok: false, missing: 'id' });
  });
});

describe('readInteractionArgs', () => {
  it('reads every declared option and drops blanks', () => {
    const values: Record<string, string> = { name: ' Dawn ', time: '06:00', description: '  ' };
    const args = readInteractionArgs({ getString: (name) => values[name] ?? null }, scheduleCommand);
    expect(args).toEqual({ name: 'Dawn', time: '06:00', description: undefined });
  });
});

describe('formatUsage', () => {
  it('marks required and optional arguments', () => {
    expect(formatUsage('!', scheduleCommand)).toBe('!schedule <name> <time> [description]');
  });
});
