import type { TimeLogDatabase } from "../db";
import type { Directory } from "./types";
import { getLedBy, getMember } from "./teamRepository";
import { getById } from "./userRepository";

/** Directory backed by the local store's users, teams and teamMembers. */
export function createLocalDirectory(db: TimeLogDatabase): Directory {
  return {
    getUser: (id) => getById(db, id),

    async leadsTeamWithActiveMember(leaderId, memberId) {
      const teams = await getLedBy(db, leaderId);
      const memberships = await Promise.all(
        teams.map((team) => getMember(db, team.id, memberId)),
      );
      return memberships.some((member) => member?.isActive === true);
    },
  };
}
