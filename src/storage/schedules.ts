/**
 * Schedule Slot Storage
 *
 * Provider time slots. Booking is a compare-and-set on the slot row:
 * only one caller can move a given slot from open to booked.
 */

import type {
  ScheduleSlot,
  SlotKey,
  SlotStatus,
  CreateScheduleSlotInput,
} from "../types/provider.js";
import type { DateRange } from "../types/appointment.js";
import { getDatabase } from "./sqlite.js";

interface SlotRow {
  provider_id: string;
  date: string;
  time: string;
  status: SlotStatus;
  room_id: string | null;
  capacity_label: string | null;
  held_by_request_id: string | null;
}

function rowToSlot(row: SlotRow): ScheduleSlot {
  return {
    providerId: row.provider_id,
    date: row.date,
    time: row.time,
    status: row.status,
    ...(row.room_id && { roomId: row.room_id }),
    ...(row.capacity_label && { capacityLabel: row.capacity_label }),
    ...(row.held_by_request_id && { heldByRequestId: row.held_by_request_id }),
  };
}

/**
 * Insert or replace a slot.
 */
export async function addSlot(input: CreateScheduleSlotInput): Promise<ScheduleSlot> {
  getDatabase()
    .prepare(
      `INSERT INTO schedule_slots (provider_id, date, time, status, room_id, capacity_label)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT(provider_id, date, time) DO UPDATE SET
         status = excluded.status,
         room_id = excluded.room_id,
         capacity_label = excluded.capacity_label,
         updated_at = datetime('now')`
    )
    .run(
      input.providerId,
      input.date,
      input.time,
      input.status,
      input.roomId ?? null,
      input.capacityLabel ?? null
    );
  return { ...input };
}

export async function getSlot(key: SlotKey): Promise<ScheduleSlot | null> {
  const row = getDatabase()
    .prepare(
      `SELECT provider_id, date, time, status, room_id, capacity_label, held_by_request_id
       FROM schedule_slots
       WHERE provider_id = ? AND date = ? AND time = ?`
    )
    .get(key.providerId, key.date, key.time) as SlotRow | undefined;

  return row ? rowToSlot(row) : null;
}

/**
 * Open slots for the given providers, optionally within a date range,
 * in (date, time) order.
 */
export async function listOpenSlots(
  providerIds: string[],
  dateRange?: DateRange
): Promise<ScheduleSlot[]> {
  if (providerIds.length === 0) return [];

  const placeholders = providerIds.map(() => "?").join(", ");
  const rows = getDatabase()
    .prepare(
      `SELECT provider_id, date, time, status, room_id, capacity_label, held_by_request_id
       FROM schedule_slots
       WHERE status = 'open'
         AND provider_id IN (${placeholders})
         AND (? IS NULL OR date >= ?)
         AND (? IS NULL OR date <= ?)
       ORDER BY date, time, provider_id`
    )
    .all(
      ...providerIds,
      dateRange?.start ?? null,
      dateRange?.start ?? null,
      dateRange?.end ?? null,
      dateRange?.end ?? null
    ) as SlotRow[];

  return rows.map(rowToSlot);
}

/**
 * Atomically move a slot from open to booked.
 * Returns false when the slot was not open (someone else got it).
 */
export async function bookSlot(key: SlotKey, requestId: string): Promise<boolean> {
  const result = getDatabase()
    .prepare(
      `UPDATE schedule_slots
       SET status = 'booked', held_by_request_id = ?, updated_at = datetime('now')
       WHERE provider_id = ? AND date = ? AND time = ? AND status = 'open'`
    )
    .run(requestId, key.providerId, key.date, key.time);

  return result.changes === 1;
}

/**
 * Move a booked slot back to open.
 * Returns false when the slot was not booked.
 */
export async function releaseSlot(key: SlotKey): Promise<boolean> {
  const result = getDatabase()
    .prepare(
      `UPDATE schedule_slots
       SET status = 'open', held_by_request_id = NULL, updated_at = datetime('now')
       WHERE provider_id = ? AND date = ? AND time = ? AND status = 'booked'`
    )
    .run(key.providerId, key.date, key.time);

  return result.changes === 1;
}
