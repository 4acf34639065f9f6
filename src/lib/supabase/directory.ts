import type { SupabaseClient } from "@supabase/supabase-js";
import type { Directory } from "../repositories/types";
import { mapPostgrestError } from "./errors";
import type { Database } from "./types";
import { DEFAULT_USER_HOURLY_RATE, type UserProfile, type UserRole } from "../../types";

type UserProfileRow = Database["public"]["Tables"]["user_profiles"]["Row"];

const ROLES: readonly UserRole[] = ["admin", "sales", "worker"];

function toRole(role: string): UserRole {
  // Unknown roles get no elevated rights
  return ROLES.find((known) => known === role) ?? "worker";
}

export function fromProfileRow(row: UserProfileRow): UserProfile {
  return {
    id: row.id,
    role: toRole(row.role),
    organisationId: row.organisation_id,
    hourlyRate: row.hourly_rate === null ? DEFAULT_USER_HOURLY_RATE : Number(row.hourly_rate),
    fullName: row.full_name,
  };
}

/** Directory reading user_profiles, teams and team_members through Supabase. */
export function createSupabaseDirectory(client: SupabaseClient<Database>): Directory {
  return {
    async getUser(id) {
      const { data, error } = await client.from("user_profiles").select("*").eq("id", id);

      if (error) throw mapPostgrestError(error, `Loading user ${id}`);
      const row = data?.[0];
      return row ? fromProfileRow(row) : undefined;
    },

    async leadsTeamWithActiveMember(leaderId, memberId) {
      const { data: teams, error: teamsErr } = await client
        .from("teams")
        .select("id")
        .eq("team_leader_id", leaderId);

      if (teamsErr) throw mapPostgrestError(teamsErr, `Loading teams led by ${leaderId}`);
      if (!teams || teams.length === 0) return false;

      const { data: members, error: membersErr } = await client
        .from("team_members")
        .select("team_id")
        .in(
          "team_id",
          teams.map((t) => t.id),
        )
        .eq("user_id", memberId)
        .eq("is_active", true);

      if (membersErr) throw mapPostgrestError(membersErr, `Loading memberships of ${memberId}`);
      return (members ?? []).length > 0;
    },
  };
}
