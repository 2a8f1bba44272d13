import { createClient as createSupabaseClient } from "@supabase/supabase-js";
import type { Database } from "@/types/supabase";

/**
 * Service-role client for batch jobs. No session is kept: the optimizer runs
 * unattended and only ever writes.
 */
export function createAdminClient(url: string, serviceRoleKey: string) {
  if (!serviceRoleKey) {
    throw new Error("Supabase admin key is missing. Set SUPABASE_SERVICE_ROLE_KEY.");
  }

  return createSupabaseClient<Database>(url, serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

export type AdminClient = ReturnType<typeof createAdminClient>;
