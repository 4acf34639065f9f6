import { randomUUID } from "node:crypto";
import type { TimeLogDatabase } from "../db";
import { applyTimeLogTrigger, toEpochMs } from "../calculations";
import { ConflictError, ConstraintViolationError, NotFoundError } from "../errors";
import { definedChanges } from "../utils/changes";
import { systemClock, toLocalISO, type Clock } from "../utils/time";
import type { TimeLogRepository } from "./types";
import type {
  StoredTimeLog,
  TimeLog,
  TimeLogQuery,
} from "../../types";

function toStored(log: TimeLog): StoredTimeLog {
  return {
    ...log,
    approvedFlag: log.isApproved ? 1 : 0,
    startEpoch: toEpochMs(log.startTime, "startTime"),
  };
}

function fromStored(stored: StoredTimeLog): TimeLog {
  const { approvedFlag: _approvedFlag, startEpoch: _startEpoch, ...log } = stored;
  return log;
}

function matches(log: StoredTimeLog, filter: TimeLogQuery, from: number, to: number): boolean {
  return (
    (filter.userId === undefined || log.userId === filter.userId) &&
    (filter.orderId === undefined || log.orderId === filter.orderId) &&
    (filter.isApproved === undefined || log.isApproved === filter.isApproved) &&
    log.startEpoch >= from &&
    log.startEpoch <= to
  );
}

/**
 * TimeLog persistence on the local IndexedDB store.
 *
 * Every write is a single readwrite transaction: the foreign-key checks,
 * the derived amount and the put commit together or not at all.
 */
export function createLocalTimeLogRepository(
  db: TimeLogDatabase,
  now: Clock = systemClock,
): TimeLogRepository {
  return {
    async insert(draft) {
      const tx = db.transaction(["timeLogs", "users", "orders"], "readwrite");

      const [user, order] = await Promise.all([
        tx.objectStore("users").get(draft.userId),
        tx.objectStore("orders").get(draft.orderId),
      ]);

      // Nothing has been written yet, so throwing leaves the store untouched
      if (!user) {
        throw new ConstraintViolationError(`time_logs.user_id references missing user: ${draft.userId}`);
      }
      if (!order) {
        throw new ConstraintViolationError(`time_logs.order_id references missing order: ${draft.orderId}`);
      }

      const at = now();
      const timestamp = toLocalISO(at);
      const log = applyTimeLogTrigger(
        {
          ...draft,
          id: randomUUID(),
          totalAmount: 0,
          createdAt: timestamp,
          updatedAt: timestamp,
        },
        at,
      );

      await Promise.all([tx.objectStore("timeLogs").add(toStored(log)), tx.done]);
      return log;
    },

    async update(id, changes, options = {}) {
      const tx = db.transaction(["timeLogs", "orders"], "readwrite");
      const store = tx.objectStore("timeLogs");

      const existing = await store.get(id);
      if (!existing) {
        throw new NotFoundError(`TimeLog not found: ${id}`);
      }
      if (options.requireOpenSession && existing.endTime !== null) {
        throw new ConflictError(`Session ${id} already ended at ${existing.endTime}`);
      }

      const patch = definedChanges(changes);
      if (patch.orderId !== undefined && patch.orderId !== existing.orderId) {
        const order = await tx.objectStore("orders").get(patch.orderId);
        if (!order) {
          throw new ConstraintViolationError(`time_logs.order_id references missing order: ${patch.orderId}`);
        }
      }

      const log = applyTimeLogTrigger({ ...fromStored(existing), ...patch }, now());

      await Promise.all([store.put(toStored(log)), tx.done]);
      return log;
    },

    async getById(id) {
      const stored = await db.get("timeLogs", id);
      return stored ? fromStored(stored) : undefined;
    },

    /**
     * Picks the narrowest index for the filter, then applies the remaining
     * criteria in memory.
     */
    async query(filter) {
      const from = filter.from !== undefined ? toEpochMs(filter.from, "from") : -Infinity;
      const to = filter.to !== undefined ? toEpochMs(filter.to, "to") : Infinity;
      const ranged = filter.from !== undefined || filter.to !== undefined;

      if (from > to) {
        return [];
      }

      let candidates: StoredTimeLog[];
      if (filter.userId !== undefined && ranged) {
        candidates = await db.getAllFromIndex(
          "timeLogs",
          "by-userId-startTime",
          IDBKeyRange.bound([filter.userId, from], [filter.userId, to]),
        );
      } else if (filter.userId !== undefined) {
        candidates = await db.getAllFromIndex("timeLogs", "by-userId", filter.userId);
      } else if (filter.orderId !== undefined) {
        candidates = await db.getAllFromIndex("timeLogs", "by-orderId", filter.orderId);
      } else if (ranged) {
        candidates = await db.getAllFromIndex("timeLogs", "by-startTime", IDBKeyRange.bound(from, to));
      } else if (filter.isApproved !== undefined) {
        candidates = await db.getAllFromIndex("timeLogs", "by-isApproved", filter.isApproved ? 1 : 0);
      } else {
        candidates = await db.getAll("timeLogs");
      }

      return candidates
        .filter((log) => matches(log, filter, from, to))
        .sort((a, b) => b.startEpoch - a.startEpoch)
        .map(fromStored);
    },
  };
}
