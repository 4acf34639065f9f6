import type { TimeLogDatabase } from "../db";
import { NotFoundError } from "../errors";
import {
  DEFAULT_USER_HOURLY_RATE,
  type UserProfile,
  type UserProfileCreate,
} from "../../types";

export async function create(db: TimeLogDatabase, data: UserProfileCreate): Promise<UserProfile> {
  const user: UserProfile = {
    ...data,
    hourlyRate: data.hourlyRate ?? DEFAULT_USER_HOURLY_RATE,
    fullName: data.fullName ?? null,
  };
  await db.add("users", user);
  return user;
}

export async function getById(db: TimeLogDatabase, id: string): Promise<UserProfile | undefined> {
  return db.get("users", id);
}

/**
 * Atomically delete a worker together with their time logs and team
 * memberships (ON DELETE CASCADE).
 *
 * @returns the number of time logs removed
 */
export async function remove(db: TimeLogDatabase, id: string): Promise<number> {
  const tx = db.transaction(["users", "timeLogs", "teamMembers"], "readwrite");

  const existing = await tx.objectStore("users").get(id);
  if (!existing) {
    throw new NotFoundError(`User not found: ${id}`);
  }

  const logStore = tx.objectStore("timeLogs");
  const memberStore = tx.objectStore("teamMembers");
  const [logIds, membershipKeys] = await Promise.all([
    logStore.index("by-userId").getAllKeys(id),
    memberStore.index("by-userId").getAllKeys(id),
  ]);

  await Promise.all([
    ...logIds.map((logId) => logStore.delete(logId)),
    ...membershipKeys.map((key) => memberStore.delete(key)),
    tx.objectStore("users").delete(id),
    tx.done,
  ]);

  return logIds.length;
}
