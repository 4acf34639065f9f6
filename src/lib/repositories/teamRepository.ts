import type { TimeLogDatabase } from "../db";
import { ConstraintViolationError, NotFoundError } from "../errors";
import type { Team, TeamMember } from "../../types";

export async function create(db: TimeLogDatabase, team: Team): Promise<Team> {
  const tx = db.transaction(["teams", "users"], "readwrite");

  const leader = await tx.objectStore("users").get(team.teamLeaderId);
  if (!leader) {
    throw new ConstraintViolationError(`teams.team_leader_id references missing user: ${team.teamLeaderId}`);
  }

  await Promise.all([tx.objectStore("teams").add(team), tx.done]);
  return team;
}

export async function getLedBy(db: TimeLogDatabase, leaderId: string): Promise<Team[]> {
  return db.getAllFromIndex("teams", "by-teamLeaderId", leaderId);
}

/**
 * Add a user to a team, or re-activate an existing membership.
 */
export async function addMember(
  db: TimeLogDatabase,
  teamId: string,
  userId: string,
  isActive = true,
): Promise<TeamMember> {
  const tx = db.transaction(["teamMembers", "teams", "users"], "readwrite");

  const [team, user] = await Promise.all([
    tx.objectStore("teams").get(teamId),
    tx.objectStore("users").get(userId),
  ]);
  if (!team) {
    throw new ConstraintViolationError(`team_members.team_id references missing team: ${teamId}`);
  }
  if (!user) {
    throw new ConstraintViolationError(`team_members.user_id references missing user: ${userId}`);
  }

  const member: TeamMember = { teamId, userId, isActive };
  await Promise.all([tx.objectStore("teamMembers").put(member), tx.done]);
  return member;
}

export async function setMemberActive(
  db: TimeLogDatabase,
  teamId: string,
  userId: string,
  isActive: boolean,
): Promise<TeamMember> {
  const tx = db.transaction("teamMembers", "readwrite");

  const existing = await tx.store.get([teamId, userId]);
  if (!existing) {
    throw new NotFoundError(`Team member not found: ${teamId}/${userId}`);
  }

  const member: TeamMember = { ...existing, isActive };
  await Promise.all([tx.store.put(member), tx.done]);
  return member;
}

export async function getMember(
  db: TimeLogDatabase,
  teamId: string,
  userId: string,
): Promise<TeamMember | undefined> {
  return db.get("teamMembers", [teamId, userId]);
}
