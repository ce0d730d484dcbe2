import type { CanonicalEvent } from "./calendar/CalendarAdapter.js";

export type SchedulingErrorCode =
  | "room_not_found"
  | "event_not_found"
  | "no_active_meeting"
  | "conflict"
  | "invalid_argument"
  | "provider_unavailable"
  | "provider_rejected";

export class SchedulingError extends Error {
  constructor(
    public code: SchedulingErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class RoomNotFoundError extends SchedulingError {
  constructor(public roomId: number) {
    super("room_not_found", "Room not found");
  }
}

export class EventNotFoundError extends SchedulingError {
  constructor(public eventId: string) {
    super("event_not_found", "Event not found");
  }
}

export class NoActiveMeetingError extends SchedulingError {
  constructor(action: "extend" | "end") {
    super("no_active_meeting", `No active meeting to ${action}`);
  }
}

export class ConflictError extends SchedulingError {
  constructor(public conflictingEvent: CanonicalEvent) {
    super("conflict", `Conflicts with existing booking: ${conflictingEvent.title}`);
  }
}

export class InvalidArgumentError extends SchedulingError {
  constructor(message: string) {
    super("invalid_argument", message);
  }
}

/** No usable credential or the provider could not be reached; retry later. */
export class ProviderUnavailableError extends SchedulingError {
  constructor(message: string) {
    super("provider_unavailable", message);
  }
}

/** The provider answered with a request-level error; retrying unchanged will not help. */
export class ProviderRejectedError extends SchedulingError {
  constructor(
    message: string,
    public status?: number
  ) {
    super("provider_rejected", message);
  }
}

/**
 * A recurring batch stopped partway. Instances created before the failure
 * stay committed; `created`/`skipped` account for them.
 */
export class PartialBatchError extends SchedulingError {
  constructor(
    public failure: SchedulingError,
    public created: number,
    public skipped: number
  ) {
    super(failure.code, `${failure.message} (after ${created} created, ${skipped} skipped)`);
  }
}

export function readHttpStatus(error: unknown): number | undefined {
  if (!error || typeof error !== "object" || !("response" in error)) return undefined;
  const response = error.response;
  if (!response || typeof response !== "object" || !("status" in response)) return undefined;
  return typeof response.status === "number" ? response.status : undefined;
}

export function describeError(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps a transport failure from a provider call onto the scheduling error kinds:
 * 404/410 mean the event is gone, any other HTTP answer is a rejection, and no
 * answer at all means the provider is unavailable.
 */
export function toProviderError(error: unknown, eventId?: string): SchedulingError {
  if (error instanceof SchedulingError) return error;
  const status = readHttpStatus(error);
  if (eventId && (status === 404 || status === 410)) {
    return new EventNotFoundError(eventId);
  }
  if (status === undefined) {
    return new ProviderUnavailableError(describeError(error));
  }
  return new ProviderRejectedError(describeError(error), status);
}
