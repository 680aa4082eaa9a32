import { randomUUID } from 'crypto';
import {
  CancelOutcome,
  JoinOutcome,
  LeaveOutcome,
  NewEventInput,
  ScheduledEvent,
} from './types';

export interface EventRegistryOptions {
  generateId?: () => string;
  now?: () => Date;
}

export function generateEventId(): string {
  return randomUUID().slice(0, 8);
}

function snapshot(event: ScheduledEvent): ScheduledEvent {
  return { ...event, participants: [...event.participants] };
}

/**
 * In-memory registry of scheduled raids, keyed by id.
 *
 * All operations go through a single promise-chain lock so they apply one at a
 * time in arrival order. Callers only ever receive copies.
 */
export class EventRegistry {
  private readonly events = new Map<string, ScheduledEvent>();
  private readonly generateId: () => string;
  private readonly now: () => Date;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: EventRegistryOptions = {}) {
    this.generateId = options.generateId ?? generateEventId;
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.events.size;
  }

  private withLock<T>(fn: () => T): Promise<T> {
    const run = this.tail.then(fn);
    // keep the chain alive when fn throws; the caller still sees the rejection
    this.tail = run.catch(() => undefined);
    return run;
  }

  create(input: NewEventInput): Promise<ScheduledEvent> {
    return this.withLock(() => {
      const name = input.name.trim();
      const time = input.time.trim();
      if (!name) throw new RangeError('Event name must not be empty');
      if (!time) throw new RangeError('Event time must not be empty');

      let id = this.generateId();
      while (this.events.has(id)) {
        id = this.generateId();
      }

      const description = input.description?.trim();
      const event: ScheduledEvent = {
        id,
        name,
        time,
        ...(description ? { description } : {}),
        creatorId: input.creatorId,
        creatorTag: input.creatorTag,
        participants: [],
        createdAt: this.now().toISOString(),
      };
      this.events.set(id, event);
      return snapshot(event);
    });
  }

  join(id: string, userId: string): Promise<JoinOutcome> {
    return this.withLock((): JoinOutcome => {
      const event = this.events.get(id);
      if (!event) return { status: 'not_found' };
      if (event.participants.includes(userId)) {
        return { status: 'already_joined', event: snapshot(event) };
      }
      event.participants.push(userId);
      return { status: 'joined', event: snapshot(event) };
    });
  }

  leave(id: string, userId: string): Promise<LeaveOutcome> {
    return this.withLock((): LeaveOutcome => {
      const event = this.events.get(id);
      if (!event) return { status: 'not_found' };
      const idx = event.participants.indexOf(userId);
      if (idx === -1) {
        return { status: 'not_joined', event: snapshot(event) };
      }
      event.participants.splice(idx, 1);
      return { status: 'left', event: snapshot(event) };
    });
  }

  cancel(id: string, requesterId: string, privileged: boolean): Promise<CancelOutcome> {
    return this.withLock((): CancelOutcome => {
      const event = this.events.get(id);
      if (!event) return { status: 'not_found' };
      if (event.creatorId !== requesterId && !privileged) {
        return { status: 'forbidden', event: snapshot(event) };
      }
      this.events.delete(id);
      return { status: 'cancelled', event: snapshot(event), participantCount: event.participants.length };
    });
  }

  get(id: string): Promise<ScheduledEvent | undefined> {
    return this.withLock(() => {
      const event = this.events.get(id);
      return event ? snapshot(event) : undefined;
    });
  }

  list(): Promise<ScheduledEvent[]> {
    return this.withLock(() => Array.from(this.events.values(), snapshot));
  }
}
