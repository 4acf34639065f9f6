/**
 * Supabase clients for the server side.
 *
 * Uses the public anon key. All data access is filtered through
 * Row Level Security policies that match auth.uid() to user_id, so a
 * request only sees what its user may see. createUserClient() attaches a
 * user's access token; getSupabase() alone acts as the anonymous role.
 *
 * Clients are created lazily, so importing this module never throws
 * when the Supabase variables are absent (e.g. local-store only setups).
 *
 * NEVER use the service_role key here.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import WebSocket from "ws";
import { getConfig } from "../config";
import { ConfigurationError } from "../errors";
import type { Database } from "./types";

let client: SupabaseClient<Database> | null = null;

/**
 * Node 20 has no global WebSocket, and supabase-js builds its realtime
 * client eagerly, so `ws` is handed in as the transport.
 */
export const realtimeTransport = { transport: WebSocket };

function credentials(): { url: string; anonKey: string } {
  const { supabaseUrl, supabaseAnonKey } = getConfig();

  if (!supabaseUrl) {
    throw new ConfigurationError("Missing SUPABASE_URL environment variable.");
  }
  if (!supabaseAnonKey) {
    throw new ConfigurationError("Missing SUPABASE_ANON_KEY environment variable.");
  }

  return { url: supabaseUrl, anonKey: supabaseAnonKey };
}

/**
 * Returns the singleton anonymous client.
 * Throws at call time (not import time) if env vars are missing.
 */
export function getSupabase(): SupabaseClient<Database> {
  if (client) return client;

  const { url, anonKey } = credentials();
  client = createClient<Database>(url, anonKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
    realtime: realtimeTransport,
  });

  return client;
}

/**
 * A client that acts as the user owning `accessToken`, so RLS evaluates
 * auth.uid() as that user. Create one per request.
 */
export function createUserClient(accessToken: string): SupabaseClient<Database> {
  const { url, anonKey } = credentials();

  return createClient<Database>(url, anonKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
    global: {
      headers: { Authorization: `Bearer ${accessToken}` },
    },
    realtime: realtimeTransport,
  });
}
