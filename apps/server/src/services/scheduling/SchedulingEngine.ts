import type {
  AdapterRegistry,
  CalendarAdapter,
  CalendarDate,
  CalendarTarget,
  CanonicalEvent,
  Room,
} from "../calendar/CalendarAdapter.js";
import {
  ConflictError,
  describeError,
  EventNotFoundError,
  InvalidArgumentError,
  NoActiveMeetingError,
  PartialBatchError,
  RoomNotFoundError,
  SchedulingError,
  toProviderError,
} from "../errors.js";
import type { RoomLookup } from "../rooms/RoomStore.js";
import {
  addDays,
  addMinutes,
  atWallClock,
  compareDates,
  dateOf,
  datesBetween,
  datesOfMonth,
  formatInZone,
  isCalendarDate,
  todayIn,
  weekdayOf,
} from "./calendarDates.js";
import { KeyedLock } from "./keyedLock.js";

export interface BookingRequest {
  title: string;
  start: Date;
  end: Date;
  booker?: string | null;
}

export interface QuickBookingRequest {
  title: string;
  durationMinutes: number;
  booker?: string | null;
}

export interface RecurringBookingRequest {
  title: string;
  startHour: number;
  startMinute: number;
  durationMinutes: number;
  booker?: string | null;
  /** 0 = Monday ... 6 = Sunday. */
  daysOfWeek: number[];
  startDate?: CalendarDate;
  endDate?: CalendarDate;
}

export interface RecurringBookingResult {
  created: number;
  skipped: number;
}

export interface RoomStatus {
  room: Room;
  date: CalendarDate;
  events: CanonicalEvent[];
  currentEvent: CanonicalEvent | null;
  nextEvent: CanonicalEvent | null;
  isAvailable: boolean;
  serverTime: string;
}

export interface SchedulingEngineOptions {
  rooms: RoomLookup;
  adapters: AdapterRegistry;
  timezone: string;
  now?: () => Date;
  /** Serialize book/bookNow/bookRecurring per room within this process. */
  serializeBookings?: boolean;
  defaultRecurringSpanDays?: number;
}

interface ResolvedRoom {
  room: Room;
  adapter: CalendarAdapter;
  target: CalendarTarget;
}

export function overlaps(event: CanonicalEvent, start: Date, end: Date) {
  return start < event.end && end > event.start;
}

function isOngoing(event: CanonicalEvent, now: Date) {
  return event.start <= now && now <= event.end;
}

function findCurrent(events: CanonicalEvent[], now: Date) {
  return events.find((event) => isOngoing(event, now)) ?? null;
}

function findNext(events: CanonicalEvent[], now: Date) {
  return events.find((event) => event.start > now) ?? null;
}

function requireDate(value: CalendarDate, name: string) {
  if (!isCalendarDate(value)) {
    throw new InvalidArgumentError(`Invalid ${name}. Use YYYY-MM-DD`);
  }
}

function requireWholeNumber(value: number, name: string, min: number, max = Number.MAX_SAFE_INTEGER) {
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `of at least ${min}` : `between ${min} and ${max}`;
    throw new InvalidArgumentError(`${name} must be a whole number ${range}`);
  }
}

function requireInstant(value: Date, name: string) {
  if (Number.isNaN(value.getTime())) {
    throw new InvalidArgumentError(`Invalid ${name}`);
  }
}

/**
 * Provider-agnostic room scheduling. Holds no data of its own: rooms come from
 * the lookup, events from the adapter registered for the room's provider.
 */
export class SchedulingEngine {
  private rooms: RoomLookup;
  private adapters: AdapterRegistry;
  private timezone: string;
  private now: () => Date;
  private bookingLock: KeyedLock<number> | null;
  private defaultRecurringSpanDays: number;

  constructor(options: SchedulingEngineOptions) {
    this.rooms = options.rooms;
    this.adapters = options.adapters;
    this.timezone = options.timezone;
    this.now = options.now ?? (() => new Date());
    this.bookingLock = options.serializeBookings ? new KeyedLock<number>() : null;
    this.defaultRecurringSpanDays = options.defaultRecurringSpanDays ?? 90;
  }

  today(): CalendarDate {
    return todayIn(this.timezone, this.now());
  }

  private adapterFor(room: Room): ResolvedRoom {
    return {
      room,
      adapter: this.adapters[room.provider ?? "local"],
      target: { roomId: room.id, calendarId: room.calendarId },
    };
  }

  private resolve(roomId: number): ResolvedRoom {
    const room = this.rooms.getRoom(roomId);
    if (!room) {
      throw new RoomNotFoundError(roomId);
    }
    return this.adapterFor(room);
  }

  private withBookingLock<T>(roomId: number, task: () => Promise<T>): Promise<T> {
    return this.bookingLock ? this.bookingLock.run(roomId, task) : task();
  }

  // ==================== Reads (fail-soft) ====================

  /** Every read goes through here: an adapter failure shows as an empty day. */
  async eventsForDate(roomId: number, date?: CalendarDate): Promise<CanonicalEvent[]> {
    const day = date ?? this.today();
    requireDate(day, "date");

    const room = this.rooms.getRoom(roomId);
    if (!room) {
      return [];
    }

    const { adapter, target } = this.adapterFor(room);
    try {
      return await adapter.listEvents(target, day);
    } catch (error) {
      console.error("📅 event listing failed; showing no events", {
        roomId,
        provider: adapter.source,
        date: day,
        error: describeError(error),
      });
      return [];
    }
  }

  async eventsForWeek(
    roomId: number,
    startDate?: CalendarDate
  ): Promise<Record<CalendarDate, CanonicalEvent[]>> {
    const first = startDate ?? this.today();
    requireDate(first, "start date");
    const dates = Array.from({ length: 7 }, (_, offset) => addDays(first, offset));
    return this.eventsForDates(roomId, dates);
  }

  async eventsForMonth(
    roomId: number,
    year: number,
    month: number
  ): Promise<Record<CalendarDate, CanonicalEvent[]>> {
    requireWholeNumber(month, "month", 1, 12);
    requireWholeNumber(year, "year", 1, 9999);
    return this.eventsForDates(roomId, datesOfMonth(year, month));
  }

  private async eventsForDates(roomId: number, dates: CalendarDate[]) {
    const days = await Promise.all(dates.map((date) => this.eventsForDate(roomId, date)));
    const byDate: Record<CalendarDate, CanonicalEvent[]> = {};
    dates.forEach((date, index) => {
      byDate[date] = days[index] ?? [];
    });
    return byDate;
  }

  async currentEvent(roomId: number): Promise<CanonicalEvent | null> {
    const now = this.now();
    const events = await this.eventsForDate(roomId, todayIn(this.timezone, now));
    return findCurrent(events, now);
  }

  async nextEvent(roomId: number): Promise<CanonicalEvent | null> {
    const now = this.now();
    const events = await this.eventsForDate(roomId, todayIn(this.timezone, now));
    return findNext(events, now);
  }

  async roomStatus(roomId: number, date?: CalendarDate): Promise<RoomStatus> {
    const { room } = this.resolve(roomId);
    const now = this.now();
    const today = todayIn(this.timezone, now);
    const day = date ?? today;
    const events = await this.eventsForDate(roomId, day);
    const isToday = day === today;
    const currentEvent = isToday ? findCurrent(events, now) : null;

    return {
      room,
      date: day,
      events,
      currentEvent,
      nextEvent: isToday ? findNext(events, now) : null,
      isAvailable: currentEvent === null,
      serverTime: formatInZone(now, this.timezone),
    };
  }

  /** Events on `start`'s day overlapping the half-open range [start, end). */
  async checkConflicts(roomId: number, start: Date, end: Date): Promise<CanonicalEvent[]> {
    requireInstant(start, "start time");
    requireInstant(end, "end time");
    const events = await this.eventsForDate(roomId, dateOf(start, this.timezone));
    return events.filter((event) => overlaps(event, start, end));
  }

  // ==================== Writes ====================

  async book(roomId: number, request: BookingRequest): Promise<CanonicalEvent> {
    const resolved = this.resolve(roomId);
    requireInstant(request.start, "start time");
    requireInstant(request.end, "end time");
    if (request.start >= request.end) {
      throw new InvalidArgumentError("End time must be after start time");
    }

    return this.withBookingLock(roomId, () => this.bookChecked(resolved, request));
  }

  async bookNow(roomId: number, request: QuickBookingRequest): Promise<CanonicalEvent> {
    const resolved = this.resolve(roomId);
    requireWholeNumber(request.durationMinutes, "duration_minutes", 1);

    return this.withBookingLock(roomId, async () => {
      const current = await this.currentEvent(roomId);
      if (current) {
        throw new ConflictError(current);
      }
      const start = this.now();
      return this.bookChecked(resolved, {
        title: request.title,
        start,
        end: addMinutes(start, request.durationMinutes),
        booker: request.booker,
      });
    });
  }

  // Read-then-write: without the booking lock, a concurrent booking can land
  // between the conflict check and the create.
  private async bookChecked(resolved: ResolvedRoom, request: BookingRequest): Promise<CanonicalEvent> {
    const conflicts = await this.checkConflicts(resolved.room.id, request.start, request.end);
    const [firstConflict] = conflicts;
    if (firstConflict) {
      throw new ConflictError(firstConflict);
    }

    const event = await resolved.adapter.createEvent(resolved.target, request);
    console.log("📅 room booked", {
      roomId: resolved.room.id,
      provider: resolved.adapter.source,
      eventId: event.id,
      start: event.start.toISOString(),
      end: event.end.toISOString(),
    });
    return event;
  }

  async extend(roomId: number, eventId: string, minutes: number): Promise<CanonicalEvent> {
    const { adapter, target } = this.resolve(roomId);
    requireWholeNumber(minutes, "minutes", 1);
    return adapter.extendEvent(target, eventId, minutes);
  }

  async end(roomId: number, eventId: string): Promise<void> {
    const resolved = this.resolve(roomId);
    const now = this.now();
    const events = await this.eventsForDate(roomId, todayIn(this.timezone, now));
    const event = events.find((item) => item.id === eventId);
    await this.endAt(resolved, eventId, event !== undefined && now <= event.start);
  }

  // A meeting ended at or before its start would be left with end <= start;
  // it is removed instead.
  private async endAt(resolved: ResolvedRoom, eventId: string, notStarted: boolean): Promise<void> {
    const { adapter, target, room } = resolved;
    try {
      if (notStarted) {
        await adapter.deleteEvent(target, eventId);
        console.log("📅 meeting ended before it began; removed", { roomId: room.id, eventId });
      } else {
        await adapter.endEvent(target, eventId);
      }
    } catch (error) {
      const failure = toProviderError(error, eventId);
      console.log("📅 ending meeting failed", { roomId: room.id, eventId, code: failure.code });
      throw failure;
    }
  }

  /** Deleting an event that is already gone is not an error. */
  async cancel(roomId: number, eventId: string): Promise<{ removed: boolean }> {
    const { adapter, target } = this.resolve(roomId);
    try {
      await adapter.deleteEvent(target, eventId);
      return { removed: true };
    } catch (error) {
      if (error instanceof EventNotFoundError) {
        console.log("📅 cancel: event already gone", { roomId, eventId });
        return { removed: false };
      }
      throw error;
    }
  }

  async extendCurrent(roomId: number, minutes: number): Promise<CanonicalEvent> {
    this.resolve(roomId);
    const current = await this.currentEvent(roomId);
    if (!current) {
      throw new NoActiveMeetingError("extend");
    }
    return this.extend(roomId, current.id, minutes);
  }

  async endCurrent(roomId: number): Promise<CanonicalEvent> {
    const resolved = this.resolve(roomId);
    const now = this.now();
    const events = await this.eventsForDate(roomId, todayIn(this.timezone, now));
    const current = findCurrent(events, now);
    if (!current) {
      throw new NoActiveMeetingError("end");
    }
    await this.endAt(resolved, current.id, now <= current.start);
    return current;
  }

  /**
   * Creates one event per matching date, each with its own conflict check.
   * Instances run one at a time so a later instance sees the earlier ones.
   * Not transactional: a failure keeps what was already created.
   */
  async bookRecurring(roomId: number, request: RecurringBookingRequest): Promise<RecurringBookingResult> {
    const resolved = this.resolve(roomId);
    requireWholeNumber(request.startHour, "start_hour", 0, 23);
    requireWholeNumber(request.startMinute, "start_minute", 0, 59);
    requireWholeNumber(request.durationMinutes, "duration_minutes", 1);
    if (request.daysOfWeek.length === 0) {
      throw new InvalidArgumentError("At least one day must be selected");
    }
    request.daysOfWeek.forEach((day) => requireWholeNumber(day, "day of week", 0, 6));

    const startDate = request.startDate ?? this.today();
    requireDate(startDate, "start date");
    const endDate = request.endDate ?? addDays(startDate, this.defaultRecurringSpanDays);
    requireDate(endDate, "end date");
    if (compareDates(endDate, startDate) < 0) {
      throw new InvalidArgumentError("End date must be after start date");
    }

    const days = new Set(request.daysOfWeek);
    return this.withBookingLock(roomId, async () => {
      let created = 0;
      let skipped = 0;

      for (const date of datesBetween(startDate, endDate)) {
        if (!days.has(weekdayOf(date))) {
          continue;
        }
        const start = atWallClock(date, request.startHour, request.startMinute, this.timezone);
        const end = addMinutes(start, request.durationMinutes);

        try {
          const conflicts = await this.checkConflicts(roomId, start, end);
          if (conflicts.length > 0) {
            skipped += 1;
            continue;
          }
          await resolved.adapter.createEvent(resolved.target, {
            title: request.title,
            start,
            end,
            booker: request.booker,
          });
          created += 1;
        } catch (error) {
          const failure = error instanceof SchedulingError ? error : toProviderError(error);
          console.log("📅 recurring booking stopped", { roomId, date, created, skipped, code: failure.code });
          throw new PartialBatchError(failure, created, skipped);
        }
      }

      console.log("📅 recurring booking done", { roomId, startDate, endDate, created, skipped });
      return { created, skipped };
    });
  }
}
