/**
 * TimeLog persistence via Supabase.
 *
 * The time_logs trigger is authoritative for total_amount and updated_at.
 * Inserts send the same values computed locally; updates send only the
 * changed columns, so concurrent writers never overwrite each other's
 * fields. RLS decides visibility: a row the user may not see behaves as
 * missing.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { applyTimeLogTrigger } from "../calculations";
import { ConflictError, NotFoundError, StorageError } from "../errors";
import type { TimeLogRepository } from "../repositories/types";
import { definedChanges } from "../utils/changes";
import { systemClock, toLocalISO, type Clock } from "../utils/time";
import { mapPostgrestError } from "./errors";
import type { Database } from "./types";
import type { MaterialEntry, TimeLog, TimeLogChanges } from "../../types";

type TimeLogRow = Database["public"]["Tables"]["time_logs"]["Row"];
type TimeLogUpdate = Database["public"]["Tables"]["time_logs"]["Update"];

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

const nullableNumber = (value: number | string | null): number | null =>
  value === null ? null : Number(value);

export function fromRow(row: TimeLogRow): TimeLog {
  return {
    id: row.id,
    orderId: row.order_id,
    userId: row.user_id,
    startTime: row.start_time,
    endTime: row.end_time,
    breakDurationMinutes: row.break_duration,
    notes: row.notes,
    isApproved: row.is_approved,
    // numeric columns may arrive as strings depending on PostgREST settings
    hourlyRate: Number(row.hourly_rate),
    totalAmount: Number(row.total_amount),
    locationLat: nullableNumber(row.location_lat),
    locationLng: nullableNumber(row.location_lng),
    photoUrls: row.photo_urls ?? [],
    materialsUsed: (row.materials_used ?? []).map(
      (m): MaterialEntry => ({
        name: m.name,
        quantity: Number(m.quantity),
        unit: m.unit,
        unitPrice: nullableNumber(m.unit_price),
      }),
    ),
    travelTimeMinutes: row.travel_time_minutes,
    workType: row.work_type,
    weatherConditions: row.weather_conditions,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const toMaterialRows = (materials: MaterialEntry[]) =>
  materials.map((m) => ({
    name: m.name,
    quantity: m.quantity,
    unit: m.unit,
    unit_price: m.unitPrice,
  }));

/** Columns an insert sends. id and created_at come from the database. */
export function toWritableColumns(
  log: Omit<TimeLog, "id" | "userId" | "createdAt">,
): Required<Omit<TimeLogUpdate, "id" | "user_id" | "created_at">> {
  return {
    order_id: log.orderId,
    start_time: log.startTime,
    end_time: log.endTime,
    break_duration: log.breakDurationMinutes,
    notes: log.notes,
    is_approved: log.isApproved,
    hourly_rate: log.hourlyRate,
    total_amount: log.totalAmount,
    location_lat: log.locationLat,
    location_lng: log.locationLng,
    photo_urls: log.photoUrls,
    materials_used: toMaterialRows(log.materialsUsed),
    travel_time_minutes: log.travelTimeMinutes,
    work_type: log.workType,
    weather_conditions: log.weatherConditions,
    updated_at: log.updatedAt,
  };
}

/** Only the columns `changes` sets; total_amount is left to the trigger. */
export function toChangedColumns(changes: TimeLogChanges, updatedAt: string): TimeLogUpdate {
  const c = definedChanges(changes);
  const columns: TimeLogUpdate = { updated_at: updatedAt };

  if (c.orderId !== undefined) columns.order_id = c.orderId;
  if (c.startTime !== undefined) columns.start_time = c.startTime;
  if (c.endTime !== undefined) columns.end_time = c.endTime;
  if (c.breakDurationMinutes !== undefined) columns.break_duration = c.breakDurationMinutes;
  if (c.notes !== undefined) columns.notes = c.notes;
  if (c.isApproved !== undefined) columns.is_approved = c.isApproved;
  if (c.hourlyRate !== undefined) columns.hourly_rate = c.hourlyRate;
  if (c.locationLat !== undefined) columns.location_lat = c.locationLat;
  if (c.locationLng !== undefined) columns.location_lng = c.locationLng;
  if (c.photoUrls !== undefined) columns.photo_urls = c.photoUrls;
  if (c.materialsUsed !== undefined) columns.materials_used = toMaterialRows(c.materialsUsed);
  if (c.travelTimeMinutes !== undefined) columns.travel_time_minutes = c.travelTimeMinutes;
  if (c.workType !== undefined) columns.work_type = c.workType;
  if (c.weatherConditions !== undefined) columns.weather_conditions = c.weatherConditions;

  return columns;
}

function firstRow(rows: TimeLogRow[] | null, context: string): TimeLogRow {
  const row = rows?.[0];
  if (!row) {
    throw new StorageError(`${context}: no row returned`);
  }
  return row;
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

export function createSupabaseTimeLogRepository(
  client: SupabaseClient<Database>,
  now: Clock = systemClock,
): TimeLogRepository {
  async function getById(id: string): Promise<TimeLog | undefined> {
    const { data, error } = await client.from("time_logs").select("*").eq("id", id);

    if (error) throw mapPostgrestError(error, `Loading time log ${id}`);
    const row = data?.[0];
    return row ? fromRow(row) : undefined;
  }

  return {
    getById,

    async insert(draft) {
      const at = now();
      const computed = applyTimeLogTrigger(
        { ...draft, totalAmount: 0, updatedAt: toLocalISO(at) },
        at,
      );

      const { data, error } = await client
        .from("time_logs")
        .insert({ ...toWritableColumns(computed), user_id: draft.userId })
        .select("*");

      if (error) throw mapPostgrestError(error, "Inserting time log");
      return fromRow(firstRow(data, "Inserting time log"));
    },

    async update(id, changes, options = {}) {
      let request = client
        .from("time_logs")
        .update(toChangedColumns(changes, toLocalISO(now())))
        .eq("id", id);
      if (options.requireOpenSession) {
        request = request.is("end_time", null);
      }

      const { data, error } = await request.select("*");

      if (error) throw mapPostgrestError(error, `Updating time log ${id}`);
      const row = data?.[0];
      if (row) {
        return fromRow(row);
      }

      // No row matched: either hidden or gone, or the session was already closed
      const current = await getById(id);
      if (current && options.requireOpenSession && current.endTime !== null) {
        throw new ConflictError(`Session ${id} already ended at ${current.endTime}`);
      }
      throw new NotFoundError(`TimeLog not found: ${id}`);
    },

    async query(filter) {
      let request = client.from("time_logs").select("*");

      if (filter.userId !== undefined) request = request.eq("user_id", filter.userId);
      if (filter.orderId !== undefined) request = request.eq("order_id", filter.orderId);
      if (filter.isApproved !== undefined) request = request.eq("is_approved", filter.isApproved);
      if (filter.from !== undefined) request = request.gte("start_time", filter.from);
      if (filter.to !== undefined) request = request.lte("start_time", filter.to);

      const { data, error } = await request.order("start_time", { ascending: false });

      if (error) throw mapPostgrestError(error, "Querying time logs");
      return (data ?? []).map(fromRow);
    },
  };
}
