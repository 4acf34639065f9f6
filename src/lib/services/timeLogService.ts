/**
 * Service layer for TimeLog operations.
 *
 * Guarantees:
 * 1. Input is validated before anything is read or written.
 * 2. Every operation passes the access policy; update-style operations
 *    pass it for the record before and after the change.
 * 3. totalAmount is derived by the repository on every write, never
 *    taken from the caller.
 *
 * The service is storage-agnostic: it runs the same on the local store
 * and on Supabase (where RLS enforces the same rules a second time).
 */

import { summarizeTimeLogs, type TimeLogSummary } from "../calculations";
import { ConflictError, NotFoundError, PermissionDeniedError } from "../errors";
import { logger } from "../logger";
import {
  assertAllowed,
  authorizeTimeLog,
  authorizeTimeLogChange,
  type AccessDecision,
  type AccessFacts,
} from "../policy";
import type { Directory, TimeLogRepository } from "../repositories/types";
import { systemClock, toLocalISO, type Clock } from "../utils/time";
import {
  parseInput,
  sessionStartSchema,
  sessionStopSchema,
  timeLogCreateSchema,
  timeLogQuerySchema,
  timeLogUpdateSchema,
  type SessionStartInput,
  type SessionStopInput,
  type TimeLogCreateInput,
  type TimeLogQueryInput,
  type TimeLogUpdateInput,
} from "../validators/timeLogs";
import type { TimeLog, TimeLogChanges, TimeLogDraft, UserProfile } from "../../types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TimeLogServiceDeps {
  repository: TimeLogRepository;
  directory: Directory;
  now?: Clock;
}

/**
 * Reading a record the actor may not see raises PermissionDeniedError on
 * the local store. On Supabase, RLS hides such a row before the policy runs,
 * so the same call raises NotFoundError there.
 */
export interface TimeLogService {
  createTimeLog(actorId: string, input: TimeLogCreateInput): Promise<TimeLog>;
  startSession(actorId: string, input: SessionStartInput): Promise<TimeLog>;
  stopSession(actorId: string, id: string, input?: SessionStopInput): Promise<TimeLog>;
  getTimeLog(actorId: string, id: string): Promise<TimeLog>;
  listTimeLogs(actorId: string, filter?: TimeLogQueryInput): Promise<TimeLog[]>;
  updateTimeLog(actorId: string, id: string, patch: TimeLogUpdateInput): Promise<TimeLog>;
  approveTimeLog(actorId: string, id: string, approved?: boolean): Promise<TimeLog>;
  summarize(actorId: string, filter?: TimeLogQueryInput): Promise<TimeLogSummary>;
}

type DraftFields = Omit<TimeLogDraft, "userId" | "startTime" | "isApproved">;

/** Optional fields of a new log, with the column defaults filled in. */
function withDefaults(
  input: Partial<DraftFields> & Pick<DraftFields, "orderId">,
  defaultRate: number,
): DraftFields {
  return {
    orderId: input.orderId,
    endTime: input.endTime ?? null,
    breakDurationMinutes: input.breakDurationMinutes ?? 0,
    notes: input.notes ?? null,
    hourlyRate: input.hourlyRate ?? defaultRate,
    locationLat: input.locationLat ?? null,
    locationLng: input.locationLng ?? null,
    photoUrls: input.photoUrls ?? [],
    materialsUsed: input.materialsUsed ?? [],
    travelTimeMinutes: input.travelTimeMinutes ?? 0,
    workType: input.workType ?? null,
    weatherConditions: input.weatherConditions ?? null,
  };
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export function createTimeLogService(deps: TimeLogServiceDeps): TimeLogService {
  const { repository, directory } = deps;
  const now = deps.now ?? systemClock;

  async function loadActor(actorId: string): Promise<UserProfile> {
    const actor = await directory.getUser(actorId);
    if (!actor) {
      logger.warn(`Rejected request from unknown user ${actorId}`);
      throw new PermissionDeniedError(`Unknown user: ${actorId}`);
    }
    return actor;
  }

  async function resolveFacts(actor: UserProfile, ownerId: string): Promise<AccessFacts> {
    if (ownerId === actor.id) {
      return { ownerOrganisationId: actor.organisationId, actorLeadsOwnersTeam: false };
    }

    const owner = await directory.getUser(ownerId);
    const ownerOrganisationId = owner?.organisationId ?? null;
    const actorLeadsOwnersTeam =
      actor.role === "sales" &&
      ownerOrganisationId === actor.organisationId &&
      (await directory.leadsTeamWithActiveMember(actor.id, ownerId));

    return { ownerOrganisationId, actorLeadsOwnersTeam };
  }

  function ensure(decision: AccessDecision, actor: UserProfile, context: string): void {
    if (!decision.allowed) {
      logger.warn(`Denied ${context} for ${actor.id}: ${decision.reason}`);
    }
    assertAllowed(decision, context);
  }

  async function loadLog(id: string): Promise<TimeLog> {
    const log = await repository.getById(id);
    if (!log) {
      throw new NotFoundError(`TimeLog not found: ${id}`);
    }
    return log;
  }

  async function authorizeChange(
    action: "update" | "approve",
    actor: UserProfile,
    existing: TimeLog,
    changes: TimeLogChanges,
  ): Promise<void> {
    const after = { ...existing, ...changes };
    const beforeFacts = await resolveFacts(actor, existing.userId);
    const afterFacts =
      after.userId === existing.userId ? beforeFacts : await resolveFacts(actor, after.userId);

    ensure(
      authorizeTimeLogChange(
        action,
        actor,
        { record: existing, facts: beforeFacts },
        { record: after, facts: afterFacts },
      ),
      actor,
      `${action} of time log ${existing.id}`,
    );
  }

  function reportWrite(verb: string, log: TimeLog, actor: UserProfile): TimeLog {
    logger.info(`${verb} time log ${log.id} (order ${log.orderId}, worker ${log.userId}) by ${actor.id}`);
    if (log.totalAmount < 0) {
      // Break longer than the session; stored as computed, flagged for review
      logger.warn(`Time log ${log.id} has a negative total amount: ${log.totalAmount}`);
    }
    return log;
  }

  async function insertAsOwner(actor: UserProfile, draft: TimeLogDraft): Promise<TimeLog> {
    ensure(
      authorizeTimeLog("create", actor, draft, await resolveFacts(actor, draft.userId)),
      actor,
      `create of time log for ${draft.userId}`,
    );
    return reportWrite("Created", await repository.insert(draft), actor);
  }

  async function listTimeLogs(
    actorId: string,
    filter: TimeLogQueryInput = {},
  ): Promise<TimeLog[]> {
    const query = parseInput(timeLogQuerySchema, filter, "time log filter");
    const actor = await loadActor(actorId);
    const logs = await repository.query(query);

    // Rows the actor may not read are left out, the way RLS filters a SELECT
    const factsByOwner = new Map<string, Promise<AccessFacts>>();
    const visible: TimeLog[] = [];
    for (const log of logs) {
      let facts = factsByOwner.get(log.userId);
      if (!facts) {
        facts = resolveFacts(actor, log.userId);
        factsByOwner.set(log.userId, facts);
      }
      if (authorizeTimeLog("read", actor, log, await facts).allowed) {
        visible.push(log);
      }
    }
    return visible;
  }

  return {
    async createTimeLog(actorId, input) {
      const data = parseInput(timeLogCreateSchema, input, "time log");
      const actor = await loadActor(actorId);

      // Only owners may create, so the actor's profile is the worker's
      return insertAsOwner(actor, {
        ...withDefaults(data, actor.hourlyRate),
        userId: data.userId,
        startTime: data.startTime,
        isApproved: false,
      });
    },

    async startSession(actorId, input) {
      const data = parseInput(sessionStartSchema, input, "session start");
      const actor = await loadActor(actorId);

      return insertAsOwner(actor, {
        ...withDefaults(data, actor.hourlyRate),
        userId: actor.id,
        startTime: toLocalISO(now()),
        isApproved: false,
      });
    },

    async stopSession(actorId, id, input = {}) {
      const data = parseInput(sessionStopSchema, input, "session stop");
      const actor = await loadActor(actorId);
      const existing = await loadLog(id);

      const changes: TimeLogChanges = { ...data, endTime: toLocalISO(now()) };
      await authorizeChange("update", actor, existing, changes);

      if (existing.endTime !== null) {
        throw new ConflictError(`Session ${id} already ended at ${existing.endTime}`);
      }

      // A concurrent stop can land after the check above; the repository re-checks in the write
      const stopped = await repository.update(id, changes, { requireOpenSession: true });
      return reportWrite("Stopped", stopped, actor);
    },

    async getTimeLog(actorId, id) {
      const actor = await loadActor(actorId);
      const log = await loadLog(id);

      ensure(
        authorizeTimeLog("read", actor, log, await resolveFacts(actor, log.userId)),
        actor,
        `read of time log ${id}`,
      );
      return log;
    },

    listTimeLogs,

    async updateTimeLog(actorId, id, patch) {
      const changes = parseInput(timeLogUpdateSchema, patch, "time log update");
      const actor = await loadActor(actorId);
      const existing = await loadLog(id);

      await authorizeChange("update", actor, existing, changes);
      return reportWrite("Updated", await repository.update(id, changes), actor);
    },

    async approveTimeLog(actorId, id, approved = true) {
      const actor = await loadActor(actorId);
      const existing = await loadLog(id);

      const changes: TimeLogChanges = { isApproved: approved };
      await authorizeChange("approve", actor, existing, changes);
      return reportWrite(approved ? "Approved" : "Unapproved", await repository.update(id, changes), actor);
    },

    async summarize(actorId, filter = {}) {
      const logs = await listTimeLogs(actorId, filter);
      return summarizeTimeLogs(logs);
    },
  };
}
