import { Router, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import type { RoomStore } from "../services/rooms/RoomStore.js";
import { addMinutes, atWallClock, formatInZone, isCalendarDate } from "../services/scheduling/calendarDates.js";
import type { SchedulingEngine } from "../services/scheduling/SchedulingEngine.js";

export interface RoomsRouterDeps {
  engine: SchedulingEngine;
  rooms: RoomStore;
  timezone: string;
  now?: () => Date;
}

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

const roomIdSchema = z.coerce.number().int().positive();
const dateSchema = z.string().refine(isCalendarDate, "Invalid date format. Use YYYY-MM-DD");
const bookerSchema = z.string().trim().min(1).optional();

const createRoomSchema = z.object({
  name: z.string().trim().min(1),
  calendar_id: z.string().trim().min(1).nullable().optional(),
  calendar_provider: z.enum(["google", "microsoft"]).nullable().optional(),
});

const eventsQuerySchema = z.object({ date: dateSchema.optional() });
const weekQuerySchema = z.object({ start_date: dateSchema.optional() });
const monthQuerySchema = z.object({
  year: z.coerce.number().int(),
  month: z.coerce.number().int(),
});

const bookSchema = z.object({
  title: z.string().trim().min(1).default("Quick Booking"),
  duration_minutes: z.coerce.number().int().positive().default(30),
  date: dateSchema.optional(),
  start_hour: z.coerce.number().int().min(0).max(23).optional(),
  start_minute: z.coerce.number().int().min(0).max(59).default(0),
  booker_name: bookerSchema,
});

const extendSchema = z.object({
  minutes: z.coerce.number().int().positive().default(15),
});

/** Accepts `[1, 3]` or `"1,3"`; 0 = Monday. */
const recurringDaysSchema = z
  .union([z.array(z.coerce.number()), z.string()])
  .transform((value, ctx) => {
    const days = Array.isArray(value)
      ? value
      : value
          .split(",")
          .map((part) => part.trim())
          .filter(Boolean)
          .map(Number);
    if (days.some((day) => !Number.isInteger(day))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid recurring_days format" });
      return z.NEVER;
    }
    return days;
  });

const recurringSchema = z.object({
  title: z.string().trim().min(1).default("Recurring Booking"),
  start_hour: z.coerce.number().int().default(9),
  start_minute: z.coerce.number().int().default(0),
  duration_minutes: z.coerce.number().int().default(540),
  booker_name: bookerSchema,
  recurring_days: recurringDaysSchema,
  recurring_start: dateSchema.optional(),
  recurring_end: dateSchema.optional(),
});

function invalidInput(res: Response, error: z.ZodError) {
  return res.status(400).json({ error: "Invalid input", details: error.flatten() });
}

export function createRoomsRouter(deps: RoomsRouterDeps): Router {
  const { engine, rooms, timezone } = deps;
  const now = deps.now ?? (() => new Date());
  const router = Router();

  function parseRoomId(req: Request, res: Response): number | null {
    const parsed = roomIdSchema.safeParse(req.params.roomId);
    if (!parsed.success) {
      res.status(404).json({ error: "Room not found", code: "room_not_found" });
      return null;
    }
    return parsed.data;
  }

  // ==================== Room management ====================

  router.get("/api/rooms", (_req, res) => {
    res.json({ rooms: rooms.listRooms() });
  });

  router.post("/api/rooms", (req, res) => {
    const parsed = createRoomSchema.safeParse(req.body);
    if (!parsed.success) {
      return invalidInput(res, parsed.error);
    }
    const room = rooms.createRoom({
      name: parsed.data.name,
      calendarId: parsed.data.calendar_id,
      provider: parsed.data.calendar_provider,
    });
    console.log("🏢 room created", { roomId: room.id, provider: room.provider ?? "local" });
    return res.status(201).json({ success: true, room });
  });

  router.delete("/api/rooms/:roomId", (req, res) => {
    const roomId = parseRoomId(req, res);
    if (roomId === null) return;
    if (!rooms.deleteRoom(roomId)) {
      return res.status(404).json({ error: "Room not found", code: "room_not_found" });
    }
    console.log("🏢 room deleted", { roomId });
    return res.json({ success: true });
  });

  // ==================== Availability ====================

  router.get(
    "/api/rooms/:roomId/events",
    asyncRoute(async (req, res) => {
      const roomId = parseRoomId(req, res);
      if (roomId === null) return;
      const parsed = eventsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return invalidInput(res, parsed.error);
      }

      const status = await engine.roomStatus(roomId, parsed.data.date);
      return res.json({
        room: status.room,
        events: status.events,
        current_event: status.currentEvent,
        next_event: status.nextEvent,
        is_available: status.isAvailable,
        server_time: status.serverTime,
        date: status.date,
      });
    })
  );

  router.get(
    "/api/rooms/:roomId/week",
    asyncRoute(async (req, res) => {
      const roomId = parseRoomId(req, res);
      if (roomId === null) return;
      const parsed = weekQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return invalidInput(res, parsed.error);
      }
      const room = rooms.getRoom(roomId);
      if (!room) {
        return res.status(404).json({ error: "Room not found", code: "room_not_found" });
      }

      const startDate = parsed.data.start_date ?? engine.today();
      const weekEvents = await engine.eventsForWeek(roomId, startDate);
      return res.json({
        room,
        week_events: weekEvents,
        start_date: startDate,
        server_time: formatInZone(now(), timezone),
      });
    })
  );

  router.get(
    "/api/rooms/:roomId/month",
    asyncRoute(async (req, res) => {
      const roomId = parseRoomId(req, res);
      if (roomId === null) return;
      const parsed = monthQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return invalidInput(res, parsed.error);
      }
      const room = rooms.getRoom(roomId);
      if (!room) {
        return res.status(404).json({ error: "Room not found", code: "room_not_found" });
      }

      const monthEvents = await engine.eventsForMonth(roomId, parsed.data.year, parsed.data.month);
      return res.json({ room, year: parsed.data.year, month: parsed.data.month, month_events: monthEvents });
    })
  );

  // ==================== Bookings ====================

  router.post(
    "/api/rooms/:roomId/book",
    asyncRoute(async (req, res) => {
      const roomId = parseRoomId(req, res);
      if (roomId === null) return;
      const parsed = bookSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return invalidInput(res, parsed.error);
      }
      const input = parsed.data;

      if (input.date && input.start_hour !== undefined) {
        const start = atWallClock(input.date, input.start_hour, input.start_minute, timezone);
        const event = await engine.book(roomId, {
          title: input.title,
          start,
          end: addMinutes(start, input.duration_minutes),
          booker: input.booker_name,
        });
        return res.json({ success: true, event });
      }

      const event = await engine.bookNow(roomId, {
        title: input.title,
        durationMinutes: input.duration_minutes,
        booker: input.booker_name,
      });
      return res.json({ success: true, event });
    })
  );

  router.post(
    "/api/rooms/:roomId/extend",
    asyncRoute(async (req, res) => {
      const roomId = parseRoomId(req, res);
      if (roomId === null) return;
      const parsed = extendSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return invalidInput(res, parsed.error);
      }
      const event = await engine.extendCurrent(roomId, parsed.data.minutes);
      return res.json({ success: true, event });
    })
  );

  router.post(
    "/api/rooms/:roomId/end",
    asyncRoute(async (req, res) => {
      const roomId = parseRoomId(req, res);
      if (roomId === null) return;
      await engine.endCurrent(roomId);
      return res.json({ success: true });
    })
  );

  router.delete(
    "/api/rooms/:roomId/events/:eventId",
    asyncRoute(async (req, res) => {
      const roomId = parseRoomId(req, res);
      if (roomId === null) return;
      const { removed } = await engine.cancel(roomId, req.params.eventId);
      return res.json({ success: true, removed });
    })
  );

  router.post(
    "/api/rooms/:roomId/book-recurring",
    asyncRoute(async (req, res) => {
      const roomId = parseRoomId(req, res);
      if (roomId === null) return;
      const parsed = recurringSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return invalidInput(res, parsed.error);
      }
      const input = parsed.data;

      const { created, skipped } = await engine.bookRecurring(roomId, {
        title: input.title,
        startHour: input.start_hour,
        startMinute: input.start_minute,
        durationMinutes: input.duration_minutes,
        booker: input.booker_name,
        daysOfWeek: input.recurring_days,
        startDate: input.recurring_start,
        endDate: input.recurring_end,
      });
      return res.json({
        success: true,
        count: created,
        skipped,
        message: `Created ${created} bookings, skipped ${skipped} due to conflicts`,
      });
    })
  );

  return router;
}
