import { createClient } from "@supabase/supabase-js";
import { config } from "../config/env.js";

/** Service-role client shared by the catalog and vector stores. */
export const supabase = createClient(config.supabase.url, config.supabase.serviceRoleKey, {
  auth: { persistSession: false },
});
