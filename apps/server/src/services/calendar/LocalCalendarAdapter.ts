import { EventNotFoundError } from "../errors.js";
import { addMinutes, dayBounds } from "../scheduling/calendarDates.js";
import type {
  CalendarAdapter,
  CalendarDate,
  CalendarTarget,
  CanonicalEvent,
  NewEventDetails,
} from "./CalendarAdapter.js";
import type { LocalEventRecord, LocalEventStore } from "./LocalEventStore.js";

function parseEventId(eventId: string): number {
  return /^\d+$/.test(eventId) ? Number(eventId) : Number.NaN;
}

export class LocalCalendarAdapter implements CalendarAdapter {
  readonly source = "local" as const;

  constructor(
    private store: LocalEventStore,
    private timezone: string,
    private now: () => Date = () => new Date()
  ) {}

  private toCanonical(record: LocalEventRecord): CanonicalEvent {
    return {
      id: String(record.id),
      title: record.title,
      start: record.start,
      end: record.end,
      organizer: record.organizer ?? "",
      provider: this.source,
    };
  }

  private requireId(eventId: string): number {
    const id = parseEventId(eventId);
    if (Number.isNaN(id)) {
      throw new EventNotFoundError(eventId);
    }
    return id;
  }

  async listEvents(target: CalendarTarget, date: CalendarDate): Promise<CanonicalEvent[]> {
    const { start, end } = dayBounds(date, this.timezone);
    return this.store
      .listByStartRange(target.roomId, start, end)
      .map((record) => this.toCanonical(record));
  }

  async createEvent(target: CalendarTarget, details: NewEventDetails): Promise<CanonicalEvent> {
    const record = this.store.create({
      roomId: target.roomId,
      title: details.title,
      start: details.start,
      end: details.end,
      organizer: details.booker,
    });
    return this.toCanonical(record);
  }

  async extendEvent(target: CalendarTarget, eventId: string, minutes: number): Promise<CanonicalEvent> {
    const id = this.requireId(eventId);
    const current = this.store.get(target.roomId, id);
    if (!current) {
      throw new EventNotFoundError(eventId);
    }
    const updated = this.store.updateEnd(target.roomId, id, addMinutes(current.end, minutes));
    if (!updated) {
      throw new EventNotFoundError(eventId);
    }
    return this.toCanonical(updated);
  }

  async endEvent(target: CalendarTarget, eventId: string): Promise<void> {
    const updated = this.store.updateEnd(target.roomId, this.requireId(eventId), this.now());
    if (!updated) {
      throw new EventNotFoundError(eventId);
    }
  }

  async deleteEvent(target: CalendarTarget, eventId: string): Promise<void> {
    if (!this.store.delete(target.roomId, this.requireId(eventId))) {
      throw new EventNotFoundError(eventId);
    }
  }
}
