import type {
  AdapterRegistry,
  CalendarAdapter,
  CalendarDate,
  CalendarTarget,
  CanonicalEvent,
  EventSource,
  NewEventDetails,
  Room,
} from "../src/services/calendar/CalendarAdapter.js";
import { EventNotFoundError, ProviderRejectedError, ProviderUnavailableError } from "../src/services/errors.js";
import type { RoomLookup } from "../src/services/rooms/RoomStore.js";
import { addMinutes, dayBounds } from "../src/services/scheduling/calendarDates.js";

export const at = (iso: string) => new Date(iso);

export class Clock {
  constructor(public current: Date) {}
  set(iso: string) {
    this.current = new Date(iso);
  }
  now = () => this.current;
}

export class FakeRooms implements RoomLookup {
  private rooms = new Map<number, Room>();

  constructor(rooms: Room[]) {
    rooms.forEach((room) => this.rooms.set(room.id, room));
  }

  getRoom(roomId: number) {
    return this.rooms.get(roomId) ?? null;
  }
}

/** In-memory backend; keeps events in insertion order like a provider would. */
export class FakeCalendarAdapter implements CalendarAdapter {
  events: Array<CanonicalEvent & { roomId: number }> = [];
  created: NewEventDetails[] = [];
  failListing = false;
  failCreateOnCall: number | null = null;
  private nextId = 1;

  constructor(
    readonly source: EventSource,
    private clock: Clock,
    private timezone = "UTC"
  ) {}

  seed(roomId: number, title: string, startIso: string, endIso: string): CanonicalEvent {
    const event = {
      roomId,
      id: `seed-${this.nextId++}`,
      title,
      start: new Date(startIso),
      end: new Date(endIso),
      organizer: "",
      provider: this.source,
    };
    this.events.push(event);
    return event;
  }

  private find(target: CalendarTarget, eventId: string) {
    const event = this.events.find((item) => item.id === eventId && item.roomId === target.roomId);
    if (!event) {
      throw new EventNotFoundError(eventId);
    }
    return event;
  }

  async listEvents(target: CalendarTarget, date: CalendarDate): Promise<CanonicalEvent[]> {
    if (this.failListing) {
      throw new ProviderUnavailableError("provider down");
    }
    const { start, end } = dayBounds(date, this.timezone);
    return this.events
      .filter((event) => event.roomId === target.roomId && event.start >= start && event.start < end)
      .sort((a, b) => a.start.getTime() - b.start.getTime())
      .map(({ roomId: _roomId, ...event }) => ({ ...event }));
  }

  async createEvent(target: CalendarTarget, details: NewEventDetails): Promise<CanonicalEvent> {
    if (this.failCreateOnCall !== null && this.created.length + 1 === this.failCreateOnCall) {
      throw new ProviderRejectedError("create rejected", 400);
    }
    this.created.push(details);
    const event = {
      roomId: target.roomId,
      id: `evt-${this.nextId++}`,
      title: details.title,
      start: details.start,
      end: details.end,
      organizer: details.booker ?? "",
      provider: this.source,
    };
    this.events.push(event);
    return { ...event };
  }

  async extendEvent(target: CalendarTarget, eventId: string, minutes: number): Promise<CanonicalEvent> {
    const event = this.find(target, eventId);
    event.end = addMinutes(event.end, minutes);
    return { ...event };
  }

  async endEvent(target: CalendarTarget, eventId: string): Promise<void> {
    this.find(target, eventId).end = this.clock.now();
  }

  async deleteEvent(target: CalendarTarget, eventId: string): Promise<void> {
    const event = this.find(target, eventId);
    this.events = this.events.filter((item) => item !== event);
  }
}

export function fakeRegistry(clock: Clock): AdapterRegistry & {
  google: FakeCalendarAdapter;
  microsoft: FakeCalendarAdapter;
  local: FakeCalendarAdapter;
} {
  return {
    google: new FakeCalendarAdapter("google", clock),
    microsoft: new FakeCalendarAdapter("microsoft", clock),
    local: new FakeCalendarAdapter("local", clock),
  };
}
