import type { DatabaseHandle } from "../roomDb.js";

export interface LocalEventRecord {
  id: number;
  roomId: number;
  title: string;
  start: Date;
  end: Date;
  organizer: string | null;
}

interface LocalEventRow {
  id: number;
  room_id: number;
  title: string;
  start_time: string;
  end_time: string;
  organizer: string | null;
}

function toRecord(row: LocalEventRow): LocalEventRecord {
  return {
    id: row.id,
    roomId: row.room_id,
    title: row.title,
    start: new Date(row.start_time),
    end: new Date(row.end_time),
    organizer: row.organizer,
  };
}

// Instants are stored as UTC ISO strings so string order is time order.
export class LocalEventStore {
  constructor(private database: DatabaseHandle) {}

  listByStartRange(roomId: number, from: Date, to: Date): LocalEventRecord[] {
    return this.database
      .prepare<[number, string, string], LocalEventRow>(
        `SELECT * FROM local_events
         WHERE room_id = ? AND start_time >= ? AND start_time < ?
         ORDER BY start_time, id`
      )
      .all(roomId, from.toISOString(), to.toISOString())
      .map(toRecord);
  }

  get(roomId: number, eventId: number): LocalEventRecord | null {
    const row = this.database
      .prepare<[number, number], LocalEventRow>(
        "SELECT * FROM local_events WHERE id = ? AND room_id = ?"
      )
      .get(eventId, roomId);
    return row ? toRecord(row) : null;
  }

  create(input: {
    roomId: number;
    title: string;
    start: Date;
    end: Date;
    organizer?: string | null;
  }): LocalEventRecord {
    const result = this.database
      .prepare<[number, string, string, string, string | null, string]>(
        `INSERT INTO local_events (room_id, title, start_time, end_time, organizer, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        input.roomId,
        input.title,
        input.start.toISOString(),
        input.end.toISOString(),
        input.organizer ?? null,
        new Date().toISOString()
      );

    return {
      id: Number(result.lastInsertRowid),
      roomId: input.roomId,
      title: input.title,
      start: input.start,
      end: input.end,
      organizer: input.organizer ?? null,
    };
  }

  updateEnd(roomId: number, eventId: number, end: Date): LocalEventRecord | null {
    const result = this.database
      .prepare<[string, number, number]>(
        "UPDATE local_events SET end_time = ? WHERE id = ? AND room_id = ?"
      )
      .run(end.toISOString(), eventId, roomId);
    return result.changes > 0 ? this.get(roomId, eventId) : null;
  }

  delete(roomId: number, eventId: number): boolean {
    const result = this.database
      .prepare<[number, number]>("DELETE FROM local_events WHERE id = ? AND room_id = ?")
      .run(eventId, roomId);
    return result.changes > 0;
  }
}
