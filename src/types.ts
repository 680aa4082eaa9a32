export interface RosterEntry {
  readonly name: string;
  readonly role: string;
}

export type ReactionSet = readonly string[];

export type ParticipantEmojiMap = Readonly<Record<string, string>>;

export interface InfoField {
  name: string;
  value: string;
}

export interface InfoDisplay {
  title: string;
  description: string;
  fields: InfoField[];
}

export interface RaidData {
  roster: readonly RosterEntry[];
  reactions: ReactionSet;
  emojis: ParticipantEmojiMap;
  info: {
    wipe: InfoDisplay;
    cotr: InfoDisplay;
  };
}

export interface ScheduledEvent {
  id: string;
  name: string;
  /** Free text as typed by the creator, never parsed. */
  time: string;
  description?: string;
  creatorId: string;
  creatorTag: string;
  participants: string[];
  createdAt: string;
}

export interface NewEventInput {
  name: string;
  time: string;
  description?: string;
  creatorId: string;
  creatorTag: string;
}

export type JoinOutcome =
  | { status: 'joined'; event: ScheduledEvent }
  | { status: 'already_joined'; event: ScheduledEvent }
  | { status: 'not_found' };

export type LeaveOutcome =
  | { status: 'left'; event: ScheduledEvent }
  | { status: 'not_joined'; event: ScheduledEvent }
  | { status: 'not_found' };

export type CancelOutcome =
  | { status: 'cancelled'; event: ScheduledEvent; participantCount: number }
  | { status: 'forbidden'; event: ScheduledEvent }
  | { status: 'not_found' };
