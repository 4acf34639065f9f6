/**
 * Core data model for worker time tracking.
 *
 * Design decisions:
 * - Monetary amounts are numbers with two decimals (the `numeric(10,2)` /
 *   `numeric(12,2)` columns). Rounding happens in lib/calculations.
 * - `hourlyRate` is snapshotted into each TimeLog so that changing a worker's
 *   default rate doesn't retroactively alter historical records.
 * - Instants are ISO 8601 strings, the same shape Supabase returns.
 * - `totalAmount` is derived. Callers never supply it.
 */

import type { DBSchema } from "idb";

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export type UserRole = "admin" | "sales" | "worker";

/** Rate given to workers whose profile doesn't set one */
export const DEFAULT_USER_HOURLY_RATE = 650;

export interface UserProfile {
  id: string;
  role: UserRole;
  /** Tenant boundary: policies never cross organisations */
  organisationId: string;
  /** Default hourly rate, copied into new time logs when none is given */
  hourlyRate: number;
  fullName: string | null;
}

/** Fields supplied when creating a user; hourlyRate falls back to 650 */
export type UserProfileCreate = Pick<UserProfile, "id" | "role" | "organisationId"> &
  Partial<Pick<UserProfile, "hourlyRate" | "fullName">>;

export interface Order {
  id: string;
  organisationId: string;
  title: string | null;
}

export interface Team {
  id: string;
  organisationId: string;
  teamLeaderId: string;
  name: string;
}

export interface TeamMember {
  teamId: string;
  userId: string;
  isActive: boolean;
}

// ---------------------------------------------------------------------------
// TimeLog
// ---------------------------------------------------------------------------

export interface MaterialEntry {
  name: string;
  quantity: number;
  unit: string | null;
  unitPrice: number | null;
}

export interface TimeLog {
  id: string;
  orderId: string;
  userId: string;
  startTime: string;
  /** null while the session is still running */
  endTime: string | null;
  breakDurationMinutes: number;
  notes: string | null;
  isApproved: boolean;
  hourlyRate: number;
  /** Computed: ((end - start in minutes) - break) / 60 * hourlyRate, 0 while open */
  totalAmount: number;
  locationLat: number | null;
  locationLng: number | null;
  photoUrls: string[];
  materialsUsed: MaterialEntry[];
  /** Recorded only; not part of totalAmount */
  travelTimeMinutes: number;
  workType: string | null;
  weatherConditions: string | null;
  createdAt: string;
  updatedAt: string;
}

/** What a repository receives on insert: everything the system doesn't generate */
export type TimeLogDraft = Omit<TimeLog, "id" | "totalAmount" | "createdAt" | "updatedAt">;

/** Fields a write may change once the record exists */
export type TimeLogChanges = Partial<
  Omit<TimeLog, "id" | "userId" | "totalAmount" | "createdAt" | "updatedAt">
>;

/** Filters backed by the time_logs indexes. `from`/`to` bound startTime inclusively. */
export interface TimeLogQuery {
  userId?: string;
  orderId?: string;
  isApproved?: boolean;
  from?: string;
  to?: string;
}

// ---------------------------------------------------------------------------
// Local database schema (used by idb to type the DB)
// ---------------------------------------------------------------------------

/**
 * TimeLog as stored in IndexedDB. IndexedDB can't index booleans, and ISO
 * strings with different offsets don't sort chronologically, so the indexed
 * values live in their own fields.
 */
export interface StoredTimeLog extends TimeLog {
  approvedFlag: 0 | 1;
  startEpoch: number;
}

export interface TimeLogDB extends DBSchema {
  timeLogs: {
    key: string;
    value: StoredTimeLog;
    indexes: {
      "by-userId": string;
      "by-orderId": string;
      "by-startTime": number;
      "by-isApproved": number;
      "by-userId-startTime": [string, number];
    };
  };
  users: {
    key: string;
    value: UserProfile;
  };
  orders: {
    key: string;
    value: Order;
  };
  teams: {
    key: string;
    value: Team;
    indexes: {
      "by-teamLeaderId": string;
    };
  };
  teamMembers: {
    key: [string, string];
    value: TeamMember;
    indexes: {
      "by-userId": string;
    };
  };
}
