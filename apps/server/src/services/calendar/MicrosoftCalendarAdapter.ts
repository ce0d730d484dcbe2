import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";
import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import timezone from "dayjs/plugin/timezone.js";
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

export const GRAPH_API_BASE = "https://graph.microsoft.com/v1.0";
const PAGE_SIZE = 100;

interface GraphDateTime {
  dateTime: string;
  timeZone?: string;
}

export interface GraphEvent {
  id?: string;
  subject?: string | null;
  isCancelled?: boolean;
  start?: GraphDateTime;
  end?: GraphDateTime;
  organizer?: { emailAddress?: { address?: string; name?: string } };
}

interface GraphEventsPage {
  value?: GraphEvent[];
  "@odata.nextLink"?: string;
}

/**
 * Graph answers in the zone named by `timeZone`; every request asks for UTC,
 * so the usual value is a UTC wall-clock string without an offset.
 */
export function parseGraphDateTime(value: GraphDateTime): Date {
  const wallClock = value.dateTime.replace(/Z$/, "");
  const zone = value.timeZone ?? "UTC";
  if (zone === "UTC" || zone === "Etc/UTC") {
    return dayjs.utc(wallClock).toDate();
  }
  return dayjs.tz(wallClock, zone).toDate();
}

function toGraphDateTime(instant: Date): GraphDateTime {
  return { dateTime: dayjs.utc(instant).format("YYYY-MM-DDTHH:mm:ss"), timeZone: "UTC" };
}

export interface MicrosoftCalendarAdapterOptions {
  credentials: CredentialSource;
  timezone: string;
  http?: AxiosInstance;
  now?: () => Date;
}

export class MicrosoftCalendarAdapter implements CalendarAdapter {
  readonly source = "microsoft" as const;
  private credentials: CredentialSource;
  private timezone: string;
  private http: AxiosInstance;
  private now: () => Date;

  constructor(options: MicrosoftCalendarAdapterOptions) {
    this.credentials = options.credentials;
    this.timezone = options.timezone;
    this.http = options.http ?? axios.create();
    this.now = options.now ?? (() => new Date());
  }

  private calendarPath(target: CalendarTarget) {
    return target.calendarId
      ? `${GRAPH_API_BASE}/me/calendars/${encodeURIComponent(target.calendarId)}`
      : `${GRAPH_API_BASE}/me/calendar`;
  }

  private eventPath(target: CalendarTarget, eventId: string) {
    return `${this.calendarPath(target)}/events/${encodeURIComponent(eventId)}`;
  }

  private async graphRequest<T>(config: AxiosRequestConfig, eventId?: string): Promise<T> {
    const credential = await this.credentials.validCredential("microsoft");
    if (!credential) {
      throw new ProviderUnavailableError("Microsoft Calendar not connected");
    }

    try {
      const response = await this.http.request<T>({
        ...config,
        headers: {
          Authorization: `Bearer ${credential.accessToken}`,
          Accept: "application/json",
          Prefer: 'outlook.timezone="UTC"',
          ...(config.data ? { "Content-Type": "application/json" } : {}),
        },
      });
      return response.data;
    } catch (error) {
      const providerError = toProviderError(error, eventId);
      console.log("📅 Graph request failed", {
        method: config.method ?? "GET",
        url: config.url,
        status: axios.isAxiosError(error) ? error.response?.status : undefined,
        code: providerError.code,
      });
      throw providerError;
    }
  }

  private toCanonical(item: GraphEvent): CanonicalEvent | null {
    if (!item.id || !item.start?.dateTime || !item.end?.dateTime) return null;
    return {
      id: item.id,
      title: item.subject || DEFAULT_EVENT_TITLE,
      start: parseGraphDateTime(item.start),
      end: parseGraphDateTime(item.end),
      organizer: item.organizer?.emailAddress?.address ?? "",
      provider: this.source,
    };
  }

  private requireCanonical(item: GraphEvent, operation: string): CanonicalEvent {
    const event = this.toCanonical(item);
    if (!event) {
      throw new ProviderRejectedError(`Microsoft Graph returned an incomplete event on ${operation}`);
    }
    return event;
  }

  async listEvents(target: CalendarTarget, date: CalendarDate): Promise<CanonicalEvent[]> {
    const { start, end } = dayBounds(date, this.timezone);
    const items: GraphEvent[] = [];

    // calendarView expands recurring series into single occurrences.
    let page = await this.graphRequest<GraphEventsPage>({
      method: "GET",
      url: `${this.calendarPath(target)}/calendarView`,
      params: {
        startDateTime: start.toISOString(),
        endDateTime: end.toISOString(),
        $orderby: "start/dateTime",
        $top: PAGE_SIZE,
      },
    });
    items.push(...(page.value ?? []));

    let nextLink = page["@odata.nextLink"];
    while (nextLink) {
      page = await this.graphRequest<GraphEventsPage>({ method: "GET", url: nextLink });
      items.push(...(page.value ?? []));
      nextLink = page["@odata.nextLink"];
    }

    return items
      .filter((item) => !item.isCancelled)
      .map((item) => this.toCanonical(item))
      .filter((event): event is CanonicalEvent => event !== null)
      .filter((event) => event.start >= start && event.start < end)
      .sort((a, b) => a.start.getTime() - b.start.getTime());
  }

  async createEvent(target: CalendarTarget, details: NewEventDetails): Promise<CanonicalEvent> {
    const created = await this.graphRequest<GraphEvent>({
      method: "POST",
      url: `${this.calendarPath(target)}/events`,
      data: {
        subject: bookedTitle(details.title, details.booker),
        body: { contentType: "text", content: bookedDescription(details.booker) },
        start: toGraphDateTime(details.start),
        end: toGraphDateTime(details.end),
      },
    });
    console.log("📅 Graph event created", { eventId: created.id });
    return this.requireCanonical(created, "create");
  }

  async extendEvent(target: CalendarTarget, eventId: string, minutes: number): Promise<CanonicalEvent> {
    const url = this.eventPath(target, eventId);
    const current = await this.graphRequest<GraphEvent>({ method: "GET", url }, eventId);
    if (!current.end?.dateTime) {
      throw new ProviderRejectedError("Microsoft Graph event has no end time");
    }

    const newEnd = addMinutes(parseGraphDateTime(current.end), minutes);
    const updated = await this.graphRequest<GraphEvent>(
      { method: "PATCH", url, data: { end: toGraphDateTime(newEnd) } },
      eventId
    );
    return this.requireCanonical(updated, "extend");
  }

  async endEvent(target: CalendarTarget, eventId: string): Promise<void> {
    await this.graphRequest<GraphEvent>(
      {
        method: "PATCH",
        url: this.eventPath(target, eventId),
        data: { end: toGraphDateTime(this.now()) },
      },
      eventId
    );
  }

  async deleteEvent(target: CalendarTarget, eventId: string): Promise<void> {
    await this.graphRequest<unknown>(
      { method: "DELETE", url: this.eventPath(target, eventId) },
      eventId
    );
  }
}
