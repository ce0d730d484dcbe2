import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import timezone from "dayjs/plugin/timezone.js";
import { google, type calendar_v3 } from "googleapis";
import type { CredentialSource } from "../credentials/CredentialProvider.js";
import { ProviderRejectedError, ProviderUnavailableError, toProviderError } from "../errors.js";
import { addMinutes, dayBounds } from "../scheduling/calendarDates.js";
import {
  bookedDescription,
  bookedTitle,
  DEFAULT_EVENT_TITLE,
  type CalendarAdapter,
  type CalendarDate,
  type CalendarTarget,
  type CanonicalEvent,
  type NewEventDetails,
} from "./CalendarAdapter.js";

dayjs.extend(utc);
dayjs.extend(timezone);

const RATE_LIMIT_RETRY_DELAYS_MS = [500, 1500, 3000];
const PAGE_SIZE = 250;

type GoogleEvent = calendar_v3.Schema$Event;

/** The slice of `calendar.events` the adapter calls. */
export interface GoogleEventsApi {
  list(params: {
    calendarId: string;
    timeMin: string;
    timeMax: string;
    singleEvents: boolean;
    orderBy: string;
    maxResults: number;
    pageToken?: string;
  }): Promise<{ data: calendar_v3.Schema$Events }>;
  get(params: { calendarId: string; eventId: string }): Promise<{ data: GoogleEvent }>;
  insert(params: { calendarId: string; requestBody: GoogleEvent }): Promise<{ data: GoogleEvent }>;
  patch(params: {
    calendarId: string;
    eventId: string;
    requestBody: GoogleEvent;
  }): Promise<{ data: GoogleEvent }>;
  delete(params: { calendarId: string; eventId: string }): Promise<unknown>;
}

export type GoogleEventsApiFactory = (accessToken: string) => GoogleEventsApi;

export function googleEventsApi(accessToken: string): GoogleEventsApi {
  const auth = new google.auth.OAuth2();
  auth.setCredentials({ access_token: accessToken });
  const calendar = google.calendar({ version: "v3", auth });

  return {
    list: (params) => calendar.events.list(params),
    get: (params) => calendar.events.get(params),
    insert: (params) => calendar.events.insert(params),
    patch: (params) => calendar.events.patch(params),
    delete: (params) => calendar.events.delete(params),
  };
}

function isRateLimitError(error: unknown) {
  if (!error || typeof error !== "object" || !("response" in error)) return false;
  const response = error.response;
  if (!response || typeof response !== "object") return false;
  const status = "status" in response ? response.status : undefined;
  if (status === 429) return true;
  if (status !== 403) return false;
  const body = "data" in response ? JSON.stringify(response.data ?? "") : "";
  return ["rateLimitExceeded", "userRateLimitExceeded"].some((reason) => body.includes(reason));
}

export async function withCalendarRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  delaysMs: number[] = RATE_LIMIT_RETRY_DELAYS_MS
): Promise<T> {
  for (let attempt = 0; attempt <= delaysMs.length; attempt += 1) {
    try {
      if (attempt > 0) {
        console.log("📅 retrying calendar operation", { operation, attempt });
      }
      return await fn();
    } catch (error) {
      if (!isRateLimitError(error) || attempt === delaysMs.length) {
        throw error;
      }
      const delayMs = delaysMs[attempt] ?? 0;
      console.log("📅 rate limit hit; backing off", { operation, delayMs });
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }
  throw new Error(`Calendar operation failed after retries: ${operation}`);
}

export interface GoogleCalendarAdapterOptions {
  credentials: CredentialSource;
  timezone: string;
  api?: GoogleEventsApiFactory;
  now?: () => Date;
  retryDelaysMs?: number[];
}

export class GoogleCalendarAdapter implements CalendarAdapter {
  readonly source = "google" as const;
  private credentials: CredentialSource;
  private timezone: string;
  private api: GoogleEventsApiFactory;
  private now: () => Date;
  private retryDelaysMs: number[];

  constructor(options: GoogleCalendarAdapterOptions) {
    this.credentials = options.credentials;
    this.timezone = options.timezone;
    this.api = options.api ?? googleEventsApi;
    this.now = options.now ?? (() => new Date());
    this.retryDelaysMs = options.retryDelaysMs ?? RATE_LIMIT_RETRY_DELAYS_MS;
  }

  private async events(): Promise<GoogleEventsApi> {
    const credential = await this.credentials.validCredential("google");
    if (!credential) {
      throw new ProviderUnavailableError("Google Calendar not connected");
    }
    return this.api(credential.accessToken);
  }

  private calendarId(target: CalendarTarget) {
    return target.calendarId || "primary";
  }

  private retry<T>(operation: string, fn: () => Promise<T>) {
    return withCalendarRetry(operation, fn, this.retryDelaysMs);
  }

  private parseTime(time: calendar_v3.Schema$EventDateTime | undefined): Date | null {
    if (time?.dateTime) return new Date(time.dateTime);
    if (time?.date) return dayjs.tz(time.date, this.timezone).toDate();
    return null;
  }

  private toCanonical(item: GoogleEvent): CanonicalEvent | null {
    const start = this.parseTime(item.start);
    const end = this.parseTime(item.end);
    if (!item.id || !start || !end) return null;
    return {
      id: item.id,
      title: item.summary || DEFAULT_EVENT_TITLE,
      start,
      end,
      organizer: item.organizer?.email ?? "",
      provider: this.source,
    };
  }

  private requireCanonical(item: GoogleEvent, operation: string): CanonicalEvent {
    const event = this.toCanonical(item);
    if (!event) {
      throw new ProviderRejectedError(`Google Calendar returned an incomplete event on ${operation}`);
    }
    return event;
  }

  async listEvents(target: CalendarTarget, date: CalendarDate): Promise<CanonicalEvent[]> {
    const events = await this.events();
    const { start, end } = dayBounds(date, this.timezone);
    const items: GoogleEvent[] = [];

    try {
      let pageToken: string | undefined;
      do {
        const response = await this.retry("list", () =>
          events.list({
            calendarId: this.calendarId(target),
            timeMin: start.toISOString(),
            timeMax: end.toISOString(),
            singleEvents: true,
            orderBy: "startTime",
            maxResults: PAGE_SIZE,
            pageToken,
          })
        );
        items.push(...(response.data.items ?? []));
        pageToken = response.data.nextPageToken ?? undefined;
      } while (pageToken);
    } catch (error) {
      throw toProviderError(error);
    }

    // timeMin/timeMax select by overlap; keep the events that start today.
    return items
      .filter((item) => item.status !== "cancelled")
      .map((item) => this.toCanonical(item))
      .filter((event): event is CanonicalEvent => event !== null)
      .filter((event) => event.start >= start && event.start < end);
  }

  async createEvent(target: CalendarTarget, details: NewEventDetails): Promise<CanonicalEvent> {
    const events = await this.events();
    const calendarId = this.calendarId(target);

    console.log("📅 INSERT start", { calendarId, start: details.start.toISOString() });

    try {
      const response = await this.retry("insert", () =>
        events.insert({
          calendarId,
          requestBody: {
            summary: bookedTitle(details.title, details.booker),
            description: bookedDescription(details.booker),
            start: { dateTime: details.start.toISOString(), timeZone: "UTC" },
            end: { dateTime: details.end.toISOString(), timeZone: "UTC" },
          },
        })
      );
      return this.requireCanonical(response.data, "insert");
    } catch (error) {
      console.log("📅 INSERT failed", { calendarId, status: toProviderError(error).code });
      throw toProviderError(error);
    }
  }

  async extendEvent(target: CalendarTarget, eventId: string, minutes: number): Promise<CanonicalEvent> {
    const events = await this.events();
    const calendarId = this.calendarId(target);

    try {
      const current = await this.retry("get", () => events.get({ calendarId, eventId }));
      const currentEnd = this.parseTime(current.data.end);
      if (!currentEnd) {
        throw new ProviderRejectedError("Google Calendar event has no end time");
      }

      const response = await this.retry("update", () =>
        events.patch({
          calendarId,
          eventId,
          requestBody: {
            end: { dateTime: addMinutes(currentEnd, minutes).toISOString(), timeZone: "UTC" },
          },
        })
      );
      console.log("📅 UPDATE success", { eventId, minutes });
      return this.requireCanonical(response.data, "update");
    } catch (error) {
      console.log("📅 UPDATE failed", { eventId, code: toProviderError(error, eventId).code });
      throw toProviderError(error, eventId);
    }
  }

  async endEvent(target: CalendarTarget, eventId: string): Promise<void> {
    const events = await this.events();
    const calendarId = this.calendarId(target);

    try {
      await this.retry("update", () =>
        events.patch({
          calendarId,
          eventId,
          requestBody: { end: { dateTime: this.now().toISOString(), timeZone: "UTC" } },
        })
      );
      console.log("📅 END success", { eventId });
    } catch (error) {
      console.log("📅 END failed", { eventId, code: toProviderError(error, eventId).code });
      throw toProviderError(error, eventId);
    }
  }

  async deleteEvent(target: CalendarTarget, eventId: string): Promise<void> {
    const events = await this.events();
    const calendarId = this.calendarId(target);

    try {
      await this.retry("delete", () => events.delete({ calendarId, eventId }));
      console.log("📅 DELETE success", { eventId });
    } catch (error) {
      console.log("📅 DELETE failed", { eventId, code: toProviderError(error, eventId).code });
      throw toProviderError(error, eventId);
    }
  }
}
