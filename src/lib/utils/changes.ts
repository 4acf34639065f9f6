import type { TimeLogChanges } from "../../types";

/** Drop keys explicitly set to undefined so a merge doesn't erase stored values. */
export function definedChanges(changes: TimeLogChanges): TimeLogChanges {
  return Object.fromEntries(
    Object.entries(changes).filter(([, value]) => value !== undefined),
  );
}
