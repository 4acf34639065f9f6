import { getDB, openTimeLogDB, type TimeLogDatabase } from "./lib/db";
import { createLocalDirectory } from "./lib/repositories/directory";
import { createLocalTimeLogRepository } from "./lib/repositories/timeLogRepository";
import { createTimeLogService, type TimeLogService } from "./lib/services/timeLogService";
import { createUserClient } from "./lib/supabase/client";
import { createSupabaseDirectory } from "./lib/supabase/directory";
import { createSupabaseTimeLogRepository } from "./lib/supabase/timeLogRepository";
import { systemClock, type Clock } from "./lib/utils/time";

export * from "./types";
export * from "./lib/errors";
export * from "./lib/calculations";
export * from "./lib/policy";
export * from "./lib/validators/timeLogs";
export type { Directory, TimeLogRepository } from "./lib/repositories/types";
export type { TimeLogService, TimeLogServiceDeps } from "./lib/services/timeLogService";
export { createTimeLogService } from "./lib/services/timeLogService";
export { getDB, openTimeLogDB, type TimeLogDatabase };
export { createLocalDirectory, createLocalTimeLogRepository };
export * as orderRepository from "./lib/repositories/orderRepository";
export * as teamRepository from "./lib/repositories/teamRepository";
export * as userRepository from "./lib/repositories/userRepository";
export { createSupabaseDirectory, createSupabaseTimeLogRepository };
export { getSupabase, createUserClient } from "./lib/supabase/client";
export type { Database } from "./lib/supabase/types";
export { loadConfig, getConfig, type AppConfig } from "./lib/config";
export { logger } from "./lib/logger";
export { toLocalISO, toLocalDate, type Clock } from "./lib/utils/time";

/** Service over an already-open local database. */
export function createLocalTimeLogService(db: TimeLogDatabase, now: Clock = systemClock): TimeLogService {
  return createTimeLogService({
    repository: createLocalTimeLogRepository(db, now),
    directory: createLocalDirectory(db),
    now,
  });
}

/**
 * Service acting as the Supabase user owning `accessToken`.
 * RLS on time_logs applies to every query it makes.
 */
export function createSupabaseTimeLogService(accessToken: string, now: Clock = systemClock): TimeLogService {
  const client = createUserClient(accessToken);
  return createTimeLogService({
    repository: createSupabaseTimeLogRepository(client, now),
    directory: createSupabaseDirectory(client),
    now,
  });
}
