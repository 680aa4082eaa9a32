import { MessageFlags } from 'discord.js';

export const EPHEMERAL = MessageFlags.Ephemeral;

/** Pause after each reaction so a roster post stays under the reaction rate limit. */
export const REACTION_DELAY_MS = 500;

export const FETCH_TIMEOUT_MS = 5000;

/** Attempts per animated-only endpoint before moving to the next one. */
export const ANIMATED_RETRIES = 3;

export const PARTICIPANT_PREVIEW = 3;

export const DEFAULT_ENTRY_EMOJI = '🔹';

export const EMBED_FIELD_LIMIT = 1024;
export const EMBED_FIELD_NAME_LIMIT = 256;
export const EMBED_MAX_FIELDS = 25;
export const EMBED_TOTAL_LIMIT = 6000;

export const COLORS = {
  red: 0xed4245,
  green: 0x57f287,
  blue: 0x5865f2,
  yellow: 0xfee75c,
  purple: 0x9b59b6,
  grey: 0x4f545c,
};
