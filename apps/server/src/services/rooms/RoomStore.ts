import type { CalendarProvider, Room } from "../calendar/CalendarAdapter.js";
import type { DatabaseHandle } from "../roomDb.js";

export interface RoomLookup {
  getRoom(roomId: number): Room | null;
}

interface RoomRow {
  id: number;
  name: string;
  calendar_id: string | null;
  calendar_provider: string | null;
}

function toProvider(value: string | null): CalendarProvider | null {
  return value === "google" || value === "microsoft" ? value : null;
}

function toRoom(row: RoomRow): Room {
  return {
    id: row.id,
    name: row.name,
    calendarId: row.calendar_id,
    provider: toProvider(row.calendar_provider),
  };
}

export class RoomStore implements RoomLookup {
  constructor(private database: DatabaseHandle) {}

  listRooms(): Room[] {
    return this.database
      .prepare<[], RoomRow>("SELECT * FROM rooms ORDER BY name")
      .all()
      .map(toRoom);
  }

  getRoom(roomId: number): Room | null {
    const row = this.database
      .prepare<[number], RoomRow>("SELECT * FROM rooms WHERE id = ?")
      .get(roomId);
    return row ? toRoom(row) : null;
  }

  createRoom(input: {
    name: string;
    calendarId?: string | null;
    provider?: CalendarProvider | null;
  }): Room {
    const now = new Date().toISOString();
    const result = this.database
      .prepare<[string, string | null, string | null, string]>(
        `INSERT INTO rooms (name, calendar_id, calendar_provider, created_at)
         VALUES (?, ?, ?, ?)`
      )
      .run(input.name, input.calendarId ?? null, input.provider ?? null, now);

    return {
      id: Number(result.lastInsertRowid),
      name: input.name,
      calendarId: input.calendarId ?? null,
      provider: input.provider ?? null,
    };
  }

  /** Removes the room together with its locally stored events. */
  deleteRoom(roomId: number): boolean {
    const removeEvents = this.database.prepare<[number]>("DELETE FROM local_events WHERE room_id = ?");
    const removeRoom = this.database.prepare<[number]>("DELETE FROM rooms WHERE id = ?");

    const remove = this.database.transaction((id: number) => {
      const result = removeRoom.run(id);
      if (result.changes === 0) return false;
      removeEvents.run(id);
      return true;
    });
    return remove(roomId);
  }
}
