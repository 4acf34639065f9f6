import type {
  TimeLog,
  TimeLogChanges,
  TimeLogDraft,
  TimeLogQuery,
  UserProfile,
} from "../../types";

/**
 * Persistence for time logs. Every insert and update derives totalAmount
 * and updatedAt inside the same write (applyTimeLogTrigger locally, the
 * time_logs trigger on Supabase), and enforces the order and user foreign
 * keys.
 */
export interface UpdateOptions {
  /** Checked inside the write: fail with ConflictError once endTime is set. */
  requireOpenSession?: boolean;
}

export interface TimeLogRepository {
  insert(draft: TimeLogDraft): Promise<TimeLog>;
  /** @throws NotFoundError if no record has this id */
  update(id: string, changes: TimeLogChanges, options?: UpdateOptions): Promise<TimeLog>;
  getById(id: string): Promise<TimeLog | undefined>;
  /** Matching records, newest startTime first */
  query(filter: TimeLogQuery): Promise<TimeLog[]>;
}

/** Read-only view of users and team membership used by the access policy. */
export interface Directory {
  getUser(id: string): Promise<UserProfile | undefined>;
  /** True when `leaderId` leads a team in which `memberId` is an active member */
  leadsTeamWithActiveMember(leaderId: string, memberId: string): Promise<boolean>;
}
