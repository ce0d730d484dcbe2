import http from "http";
import { once } from "events";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { createApp } from "../src/app.js";
import type { AdapterRegistry } from "../src/services/calendar/CalendarAdapter.js";
import { LocalCalendarAdapter } from "../src/services/calendar/LocalCalendarAdapter.js";
import { LocalEventStore } from "../src/services/calendar/LocalEventStore.js";
import { openDatabase } from "../src/services/roomDb.js";
import { RoomStore } from "../src/services/rooms/RoomStore.js";
import { SchedulingEngine } from "../src/services/scheduling/SchedulingEngine.js";
import { at, Clock, fakeRegistry } from "./helpers.js";

const bookedEvent = z.object({ event: z.object({ id: z.string() }) });

describe("rooms routes", () => {
  let server: http.Server;
  let baseUrl: string;
  let clock: Clock;
  let rooms: RoomStore;
  let fakes: ReturnType<typeof fakeRegistry>;

  async function start(useFakeLocal = false) {
    const database = openDatabase(":memory:");
    rooms = new RoomStore(database);
    clock = new Clock(at("2024-01-10T08:00:00Z"));
    fakes = fakeRegistry(clock);
    const adapters: AdapterRegistry = useFakeLocal
      ? fakes
      : { ...fakes, local: new LocalCalendarAdapter(new LocalEventStore(database), "UTC", clock.now) };
    const engine = new SchedulingEngine({ rooms, adapters, timezone: "UTC", now: clock.now });

    server = http.createServer(createApp({ engine, rooms, timezone: "UTC", now: clock.now }));
    server.listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("server has no port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  async function api(path: string, options: { method?: string; body?: unknown } = {}) {
    const response = await fetch(`${baseUrl}${path}`, {
      method: options.method ?? "GET",
      headers: { "Content-Type": "application/json" },
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    const body: unknown = await response.json();
    return { status: response.status, body };
  }

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  describe("with the local store", () => {
    let roomId: number;

    beforeEach(async () => {
      await start();
      roomId = rooms.createRoom({ name: "Maple" }).id;
    });

    it("creates and lists rooms", async () => {
      const created = await api("/api/rooms", {
        method: "POST",
        body: { name: "Birch", calendar_id: "birch@example.com", calendar_provider: "google" },
      });

      expect(created.status).toBe(201);
      expect(created.body).toEqual({
        success: true,
        room: { id: roomId + 1, name: "Birch", calendarId: "birch@example.com", provider: "google" },
      });

      const listed = await api("/api/rooms");
      expect(listed.body).toEqual({
        rooms: [
          { id: roomId + 1, name: "Birch", calendarId: "birch@example.com", provider: "google" },
          { id: roomId, name: "Maple", calendarId: null, provider: null },
        ],
      });
    });

    it("rejects a room without a name", async () => {
      const response = await api("/api/rooms", { method: "POST", body: { name: " " } });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ error: "Invalid input" });
    });

    it("books a slot and reports the conflict on a second overlapping one", async () => {
      const booked = await api(`/api/rooms/${roomId}/book`, {
        method: "POST",
        body: { title: "Sync", date: "2024-01-10", start_hour: 10, duration_minutes: 60, booker_name: "Ana" },
      });

      expect(booked.status).toBe(200);
      expect(booked.body).toEqual({
        success: true,
        event: {
          id: "1",
          title: "Sync",
          start: "2024-01-10T10:00:00.000Z",
          end: "2024-01-10T11:00:00.000Z",
          organizer: "Ana",
          provider: "local",
        },
      });

      const clash = await api(`/api/rooms/${roomId}/book`, {
        method: "POST",
        body: { title: "Overlap", date: "2024-01-10", start_hour: 10, start_minute: 30 },
      });
      expect(clash.status).toBe(409);
      expect(clash.body).toEqual({ error: "Conflicts with existing booking: Sync", code: "conflict" });
    });

    it("reports the day with current and next meetings", async () => {
      await api(`/api/rooms/${roomId}/book`, {
        method: "POST",
        body: { title: "Sync", date: "2024-01-10", start_hour: 10, duration_minutes: 60 },
      });

      const day = await api(`/api/rooms/${roomId}/events?date=2024-01-10`);

      expect(day.status).toBe(200);
      expect(day.body).toMatchObject({
        room: { id: roomId, name: "Maple" },
        current_event: null,
        next_event: { title: "Sync", start: "2024-01-10T10:00:00.000Z" },
        is_available: true,
        date: "2024-01-10",
      });
    });

    it("books now with the defaults, then extends and ends the meeting", async () => {
      const booked = await api(`/api/rooms/${roomId}/book`, { method: "POST", body: {} });
      expect(booked.body).toMatchObject({
        success: true,
        event: { title: "Quick Booking", start: "2024-01-10T08:00:00.000Z", end: "2024-01-10T08:30:00.000Z" },
      });

      const occupied = await api(`/api/rooms/${roomId}/book`, { method: "POST", body: {} });
      expect(occupied.status).toBe(409);

      const extended = await api(`/api/rooms/${roomId}/extend`, { method: "POST", body: {} });
      expect(extended.body).toMatchObject({ success: true, event: { end: "2024-01-10T08:45:00.000Z" } });

      clock.set("2024-01-10T08:10:00Z");
      const ended = await api(`/api/rooms/${roomId}/end`, { method: "POST" });
      expect(ended).toEqual({ status: 200, body: { success: true } });

      clock.set("2024-01-10T08:11:00Z");
      const status = await api(`/api/rooms/${roomId}/events`);
      expect(status.body).toMatchObject({ current_event: null, is_available: true });
    });

    it("answers 400 when there is no meeting to extend or end", async () => {
      const extended = await api(`/api/rooms/${roomId}/extend`, { method: "POST", body: { minutes: 10 } });
      const ended = await api(`/api/rooms/${roomId}/end`, { method: "POST" });

      expect(extended).toEqual({
        status: 400,
        body: { error: "No active meeting to extend", code: "no_active_meeting" },
      });
      expect(ended).toEqual({ status: 400, body: { error: "No active meeting to end", code: "no_active_meeting" } });
    });

    it("cancels an event and treats a repeat as already done", async () => {
      const booked = await api(`/api/rooms/${roomId}/book`, {
        method: "POST",
        body: { date: "2024-01-11", start_hour: 9 },
      });
      const { event } = bookedEvent.parse(booked.body);

      const first = await api(`/api/rooms/${roomId}/events/${event.id}`, { method: "DELETE" });
      const second = await api(`/api/rooms/${roomId}/events/${event.id}`, { method: "DELETE" });

      expect(first.body).toEqual({ success: true, removed: true });
      expect(second.body).toEqual({ success: true, removed: false });
    });

    it("books a recurring series from comma-separated days", async () => {
      await api(`/api/rooms/${roomId}/book`, {
        method: "POST",
        body: { title: "All hands", date: "2024-01-10", start_hour: 9, start_minute: 30, duration_minutes: 30 },
      });

      const series = await api(`/api/rooms/${roomId}/book-recurring`, {
        method: "POST",
        body: {
          title: "Team sync",
          start_hour: 9,
          duration_minutes: 60,
          recurring_days: "0,2",
          recurring_start: "2024-01-01",
          recurring_end: "2024-01-14",
        },
      });

      expect(series).toEqual({
        status: 200,
        body: {
          success: true,
          count: 3,
          skipped: 1,
          message: "Created 3 bookings, skipped 1 due to conflicts",
        },
      });

      const week = await api(`/api/rooms/${roomId}/week?start_date=2024-01-08`);
      expect(week.body).toMatchObject({
        start_date: "2024-01-08",
        week_events: {
          "2024-01-08": [{ title: "Team sync" }],
          "2024-01-10": [{ title: "All hands" }],
          "2024-01-14": [],
        },
      });
    });

    it("rejects recurring days outside the week", async () => {
      const series = await api(`/api/rooms/${roomId}/book-recurring`, {
        method: "POST",
        body: { recurring_days: [1, 9], recurring_start: "2024-01-01", recurring_end: "2024-01-14" },
      });

      expect(series.status).toBe(400);
      expect(series.body).toMatchObject({ code: "invalid_argument" });
    });

    it("validates dates and months", async () => {
      const badDate = await api(`/api/rooms/${roomId}/events?date=2024-02-30`);
      const badMonth = await api(`/api/rooms/${roomId}/month?year=2024&month=13`);
      const goodMonth = await api(`/api/rooms/${roomId}/month?year=2024&month=2`);

      expect(badDate.status).toBe(400);
      expect(badDate.body).toMatchObject({ error: "Invalid input" });
      expect(badMonth).toEqual({
        status: 400,
        body: { error: "month must be a whole number between 1 and 12", code: "invalid_argument" },
      });
      expect(goodMonth.body).toMatchObject({ year: 2024, month: 2, month_events: { "2024-02-29": [] } });
    });

    it("deletes a room and its bookings", async () => {
      await api(`/api/rooms/${roomId}/book`, { method: "POST", body: { date: "2024-01-10", start_hour: 9 } });

      const removed = await api(`/api/rooms/${roomId}`, { method: "DELETE" });
      const status = await api(`/api/rooms/${roomId}/events?date=2024-01-10`);

      expect(removed).toEqual({ status: 200, body: { success: true } });
      expect(status.status).toBe(404);
      expect(rooms.listRooms()).toEqual([]);
    });

    it("answers 404 for unknown rooms", async () => {
      const missing = await api("/api/rooms/99/events");
      const malformed = await api("/api/rooms/abc/week");
      const removed = await api("/api/rooms/99", { method: "DELETE" });

      expect(missing).toEqual({ status: 404, body: { error: "Room not found", code: "room_not_found" } });
      expect(malformed.status).toBe(404);
      expect(removed.status).toBe(404);
    });

    it("serves the health check", async () => {
      await expect(api("/health")).resolves.toEqual({ status: 200, body: { ok: true } });
    });
  });

  describe("with a failing backend", () => {
    let roomId: number;

    beforeEach(async () => {
      await start(true);
      roomId = rooms.createRoom({ name: "Cedar" }).id;
    });

    it("reports how far a recurring series got", async () => {
      fakes.local.failCreateOnCall = 2;

      const series = await api(`/api/rooms/${roomId}/book-recurring`, {
        method: "POST",
        body: { recurring_days: [0], recurring_start: "2024-01-01", recurring_end: "2024-01-21" },
      });

      expect(series).toEqual({
        status: 502,
        body: {
          error: "create rejected (after 1 created, 0 skipped)",
          code: "provider_rejected",
          count: 1,
          skipped: 0,
        },
      });
    });

    it("shows an empty day when the backend cannot be read", async () => {
      fakes.local.failListing = true;

      const day = await api(`/api/rooms/${roomId}/events?date=2024-01-10`);

      expect(day.body).toMatchObject({ events: [], is_available: true });
    });
  });
});
