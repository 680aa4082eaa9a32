import { CommandArgs, CommandDefinition, CommandOption } from './types';

export interface PrefixInvocation {
  name: string;
  rest: string;
}

export type ParseResult =
  | { ok: true; args: CommandArgs }
  | { ok: false; missing: string };

/** Splits "!name rest of line" into its parts; null when the content is not a command. */
export function parsePrefixCommand(content: string, prefix: string): PrefixInvocation | null {
  if (!content.startsWith(prefix)) return null;
  const match = /^(\S+)\s*([\s\S]*)$/.exec(content.slice(prefix.length));
  if (!match) return null;
  return { name: match[1].toLowerCase(), rest: match[2].trim() };
}

interface Token {
  value: string;
  end: number;
}

function nextToken(input: string, from: number): Token | null {
  let pos = from;
  while (pos < input.length && /\s/.test(input[pos])) pos++;
  if (pos >= input.length) return null;

  if (input[pos] === '"') {
    const close = input.indexOf('"', pos + 1);
    if (close === -1) {
      return { value: input.slice(pos + 1), end: input.length };
    }
    return { value: input.slice(pos + 1, close), end: close + 1 };
  }

  let end = pos;
  while (end < input.length && !/\s/.test(input[end])) end++;
  return { value: input.slice(pos, end), end };
}

/** Whitespace-separated tokens; double quotes group words. */
export function tokenizeArguments(input: string): string[] {
  const tokens: string[] = [];
  let token = nextToken(input, 0);
  while (token) {
    tokens.push(token.value);
    token = nextToken(input, token.end);
  }
  return tokens;
}

function stripQuotes(raw: string): string {
  if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) {
    return raw.slice(1, -1);
  }
  return raw;
}

export function parsePrefixArguments(options: readonly CommandOption[], input: string): ParseResult {
  const args: CommandArgs = {};
  let pos = 0;

  for (const option of options) {
    let value: string | undefined;
    if (option.rest) {
      value = stripQuotes(input.slice(pos).trim()).trim() || undefined;
      pos = input.length;
    } else {
      const token = nextToken(input, pos);
      if (token) {
        value = token.value.trim() || undefined;
        pos = token.end;
      }
    }
    if (option.required && value === undefined) {
      return { ok: false, missing: option.name };
    }
    args[option.name] = value;
  }

  return { ok: true, args };
}

export function readInteractionArgs(
  options: { getString(name: string): string | null },
  definition: CommandDefinition
): CommandArgs {
  const args: CommandArgs = {};
  for (const option of definition.options) {
    args[option.name] = options.getString(option.name)?.trim() || undefined;
  }
  return args;
}

export function formatUsage(prefix: string, definition: CommandDefinition): string {
  const parts = definition.options.map((o) => (o.required ? `<${o.name}>` : `[${o.name}]`));
  return [`${prefix}${definition.name}`, ...parts].join(' ');
}
