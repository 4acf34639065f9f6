/**
 * IndexedDB setup using the `idb` wrapper library.
 *
 * Node has no IndexedDB of its own. When the host provides none,
 * `fake-indexeddb/auto` installs an in-memory implementation on the global
 * scope the first time a database is opened, so Supabase-only use leaves
 * the globals alone.
 *
 * Design decisions:
 * - One shared connection per database name (cached promise).
 * - DB version 1 creates all object stores with their indexes. The
 *   timeLogs indexes are the same as the time_logs table's.
 * - Booleans (TimeLog.isApproved) are indexed through `approvedFlag` (0/1)
 *   because IndexedDB cannot index boolean values.
 */

import { openDB, type IDBPDatabase } from "idb";
import { getConfig } from "../config";
import type { TimeLogDB } from "../../types";

const DB_VERSION = 1;

export type TimeLogDatabase = IDBPDatabase<TimeLogDB>;

/**
 * Open (and on first use, create) a database. Each call returns a new connection.
 */
export async function openTimeLogDB(name: string): Promise<TimeLogDatabase> {
  if (!("indexedDB" in globalThis)) {
    await import("fake-indexeddb/auto");
  }

  return openDB<TimeLogDB>(name, DB_VERSION, {
    upgrade(db) {
      // -- Time logs --
      const timeLogStore = db.createObjectStore("timeLogs", { keyPath: "id" });
      timeLogStore.createIndex("by-userId", "userId");
      timeLogStore.createIndex("by-orderId", "orderId");
      timeLogStore.createIndex("by-startTime", "startEpoch");
      timeLogStore.createIndex("by-isApproved", "approvedFlag");
      timeLogStore.createIndex("by-userId-startTime", ["userId", "startEpoch"]);

      // -- Collaborators --
      db.createObjectStore("users", { keyPath: "id" });
      db.createObjectStore("orders", { keyPath: "id" });

      const teamStore = db.createObjectStore("teams", { keyPath: "id" });
      teamStore.createIndex("by-teamLeaderId", "teamLeaderId");

      const memberStore = db.createObjectStore("teamMembers", {
        keyPath: ["teamId", "userId"],
      });
      memberStore.createIndex("by-userId", "userId");
    },
  });
}

const connections = new Map<string, Promise<TimeLogDatabase>>();

/**
 * Returns the shared connection for `name` (default: LOCAL_DB_NAME).
 *
 * Under Node the store is the in-memory one: local data does not survive
 * the process.
 */
export function getDB(name: string = getConfig().localDbName): Promise<TimeLogDatabase> {
  let connection = connections.get(name);
  if (!connection) {
    connection = openTimeLogDB(name);
    connections.set(name, connection);
  }
  return connection;
}
