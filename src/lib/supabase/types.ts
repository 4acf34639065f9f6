/**
 * Supabase Database type definitions.
 *
 * Written to match the SQL schema in
 * supabase/migrations/20250824115504_time_logs.sql
 * plus the pre-existing user_profiles, orders, teams and team_members tables.
 */

export interface MaterialRow {
  name: string;
  quantity: number;
  unit: string | null;
  unit_price: number | null;
}

export interface Database {
  public: {
    Tables: {
      time_logs: {
        Row: {
          id: string;
          order_id: string;
          user_id: string;
          start_time: string;
          end_time: string | null;
          break_duration: number;
          notes: string | null;
          is_approved: boolean;
          hourly_rate: number;
          total_amount: number;
          location_lat: number | null;
          location_lng: number | null;
          photo_urls: string[];
          materials_used: MaterialRow[];
          travel_time_minutes: number;
          work_type: string | null;
          weather_conditions: string | null;
          created_at: string;
          updated_at: string;
        };
        Insert: {
          id?: string;
          order_id: string;
          user_id: string;
          start_time: string;
          end_time?: string | null;
          break_duration?: number;
          notes?: string | null;
          is_approved?: boolean;
          hourly_rate?: number;
          total_amount?: number;
          location_lat?: number | null;
          location_lng?: number | null;
          photo_urls?: string[];
          materials_used?: MaterialRow[];
          travel_time_minutes?: number;
          work_type?: string | null;
          weather_conditions?: string | null;
          created_at?: string;
          updated_at?: string;
        };
        Update: {
          id?: string;
          order_id?: string;
          user_id?: string;
          start_time?: string;
          end_time?: string | null;
          break_duration?: number;
          notes?: string | null;
          is_approved?: boolean;
          hourly_rate?: number;
          total_amount?: number;
          location_lat?: number | null;
          location_lng?: number | null;
          photo_urls?: string[];
          materials_used?: MaterialRow[];
          travel_time_minutes?: number;
          work_type?: string | null;
          weather_conditions?: string | null;
          created_at?: string;
          updated_at?: string;
        };
        Relationships: [];
      };
      user_profiles: {
        Row: {
          id: string;
          role: string;
          organisation_id: string;
          hourly_rate: number | null;
          full_name: string | null;
        };
        Insert: {
          id: string;
          role: string;
          organisation_id: string;
          hourly_rate?: number | null;
          full_name?: string | null;
        };
        Update: {
          id?: string;
          role?: string;
          organisation_id?: string;
          hourly_rate?: number | null;
          full_name?: string | null;
        };
        Relationships: [];
      };
      teams: {
        Row: {
          id: string;
          organisation_id: string;
          team_leader_id: string;
          name: string;
        };
        Insert: {
          id?: string;
          organisation_id: string;
          team_leader_id: string;
          name: string;
        };
        Update: {
          id?: string;
          organisation_id?: string;
          team_leader_id?: string;
          name?: string;
        };
        Relationships: [];
      };
      team_members: {
        Row: {
          team_id: string;
          user_id: string;
          is_active: boolean;
        };
        Insert: {
          team_id: string;
          user_id: string;
          is_active?: boolean;
        };
        Update: {
          team_id?: string;
          user_id?: string;
          is_active?: boolean;
        };
        Relationships: [];
      };
    };
    Views: {
      [_ in never]: never;
    };
    Functions: {
      [_ in never]: never;
    };
    Enums: {
      [_ in never]: never;
    };
    CompositeTypes: {
      [_ in never]: never;
    };
  };
}
