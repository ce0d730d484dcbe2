export type CalendarProvider = "google" | "microsoft";

export type EventSource = CalendarProvider | "local";

/** "YYYY-MM-DD" in the configured timezone. */
export type CalendarDate = string;

export interface Room {
  id: number;
  name: string;
  calendarId: string | null;
  provider: CalendarProvider | null;
}

export interface CanonicalEvent {
  id: string;
  title: string;
  start: Date;
  end: Date;
  organizer: string;
  provider: EventSource;
}

export interface CalendarTarget {
  roomId: number;
  calendarId: string | null;
}

export interface NewEventDetails {
  title: string;
  start: Date;
  end: Date;
  booker?: string | null;
}

/**
 * One backend serving room events. Reads throw on failure; the scheduling
 * engine is the single place that turns a failed read into an empty day.
 */
export interface CalendarAdapter {
  readonly source: EventSource;
  listEvents(target: CalendarTarget, date: CalendarDate): Promise<CanonicalEvent[]>;
  createEvent(target: CalendarTarget, details: NewEventDetails): Promise<CanonicalEvent>;
  extendEvent(target: CalendarTarget, eventId: string, minutes: number): Promise<CanonicalEvent>;
  endEvent(target: CalendarTarget, eventId: string): Promise<void>;
  deleteEvent(target: CalendarTarget, eventId: string): Promise<void>;
}

export type AdapterRegistry = Record<EventSource, CalendarAdapter>;

export const DEFAULT_EVENT_TITLE = "Busy";

export function bookedTitle(title: string, booker?: string | null) {
  return booker ? `${title} (${booker})` : title;
}

export function bookedDescription(booker?: string | null) {
  return booker ? `Booked by ${booker} via RoomSync` : "Booked via RoomSync";
}
