/**
 * Access policy for time logs.
 *
 * One pure function decides every operation, replacing the row-level
 * security predicates of the `time_logs` table:
 *
 * - Owner (record.userId === actor.id): create, read, update.
 * - Admin in the owner's organisation: read, approve.
 * - Team leader (role "sales") in the owner's organisation who leads a team
 *   the owner is an active member of: read, approve.
 * - Anyone else: nothing.
 *
 * There is no delete action. Time logs disappear only with their order or
 * worker.
 */

import { PermissionDeniedError } from "../errors";
import type { TimeLog, UserProfile } from "../../types";

export type TimeLogAction = "create" | "read" | "update" | "approve";

export type AccessGrant = "owner" | "admin" | "team_leader";

export type Actor = Pick<UserProfile, "id" | "role" | "organisationId">;

/**
 * Relationship facts about the record's owner, resolved by the caller
 * from the directory before the policy runs.
 */
export interface AccessFacts {
  /** Organisation of record.userId; null when the owner is unknown */
  ownerOrganisationId: string | null;
  /** Actor leads a team in which the owner is an active member */
  actorLeadsOwnersTeam: boolean;
}

export type AccessDecision =
  | { allowed: true; via: AccessGrant }
  | { allowed: false; reason: string };

const allow = (via: AccessGrant): AccessDecision => ({ allowed: true, via });
const deny = (reason: string): AccessDecision => ({ allowed: false, reason });

function approverGrant(actor: Actor, facts: AccessFacts): AccessGrant | null {
  if (facts.ownerOrganisationId === null || facts.ownerOrganisationId !== actor.organisationId) {
    return null;
  }
  if (actor.role === "admin") {
    return "admin";
  }
  if (actor.role === "sales" && facts.actorLeadsOwnersTeam) {
    return "team_leader";
  }
  return null;
}

export function authorizeTimeLog(
  action: TimeLogAction,
  actor: Actor,
  record: Pick<TimeLog, "userId">,
  facts: AccessFacts,
): AccessDecision {
  const isOwner = record.userId === actor.id;

  switch (action) {
    case "create":
    case "update":
      return isOwner
        ? allow("owner")
        : deny(`${action} is limited to the worker who owns the time log`);

    case "read": {
      if (isOwner) {
        return allow("owner");
      }
      const grant = approverGrant(actor, facts);
      return grant ? allow(grant) : deny("not the owner, an admin or the owner's team leader");
    }

    case "approve": {
      const grant = approverGrant(actor, facts);
      return grant ? allow(grant) : deny("only admins and team leaders of the owner may approve");
    }
  }
}

/**
 * Update-style actions must hold for the record as it is and as it will be,
 * so a write can't move a record out of the actor's reach.
 */
export function authorizeTimeLogChange(
  action: "update" | "approve",
  actor: Actor,
  before: { record: Pick<TimeLog, "userId">; facts: AccessFacts },
  after: { record: Pick<TimeLog, "userId">; facts: AccessFacts },
): AccessDecision {
  const current = authorizeTimeLog(action, actor, before.record, before.facts);
  if (!current.allowed) {
    return current;
  }

  const next = authorizeTimeLog(action, actor, after.record, after.facts);
  if (!next.allowed) {
    return deny(`the change would leave the record out of reach: ${next.reason}`);
  }
  return next;
}

export function assertAllowed(
  decision: AccessDecision,
  context: string,
): asserts decision is { allowed: true; via: AccessGrant } {
  if (!decision.allowed) {
    throw new PermissionDeniedError(`${context}: ${decision.reason}`);
  }
}
