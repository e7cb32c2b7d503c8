import { createClient } from "@supabase/supabase-js";
import type { SlugLookup } from "../../common/src/slug.js";

export const POSTS_TABLE = "blog_posts";

export type StoreRow = Record<string, unknown>;

export type InsertResult =
  | { ok: true; status: number }
  | { ok: false; conflict: boolean; status: number; message: string };

export interface PostStore extends SlugLookup {
  ping(): Promise<{ ok: boolean; message: string | null }>;
  insert(row: StoreRow): Promise<InsertResult>;
}

export interface SupabaseStoreOptions {
  url: string;
  serviceKey: string;
  readTimeoutMs: number;
  insertTimeoutMs: number;
  fetch?: typeof fetch;
}

const UNIQUE_VIOLATION = "23505";

export class SupabasePostStore implements PostStore {
  private readonly client: ReturnType<typeof createClient>;

  constructor(private readonly options: SupabaseStoreOptions) {
    this.client = createClient(options.url, options.serviceKey, {
      auth: { persistSession: false, autoRefreshToken: false, detectSessionInUrl: false },
      ...(options.fetch ? { global: { fetch: options.fetch } } : {}),
    });
  }

  async ping(): Promise<{ ok: boolean; message: string | null }> {
    const { error, status } = await this.client
      .from(POSTS_TABLE)
      .select("id")
      .limit(1)
      .abortSignal(AbortSignal.timeout(this.options.readTimeoutMs));

    if (error || status !== 200) {
      return { ok: false, message: `${status}: ${error?.message ?? "unexpected status"}` };
    }
    return { ok: true, message: null };
  }

  async slugExists(slug: string): Promise<boolean> {
    const { data, error, status } = await this.client
      .from(POSTS_TABLE)
      .select("slug")
      .eq("slug", slug)
      .abortSignal(AbortSignal.timeout(this.options.readTimeoutMs));

    if (error) {
      throw new Error(`slug lookup failed with ${status}: ${error.message}`);
    }
    return Array.isArray(data) && data.length > 0;
  }

  async insert(row: StoreRow): Promise<InsertResult> {
    const { error, status } = await this.client
      .from(POSTS_TABLE)
      .insert(row)
      .abortSignal(AbortSignal.timeout(this.options.insertTimeoutMs));

    if (!error && (status === 201 || status === 200)) {
      return { ok: true, status };
    }

    return {
      ok: false,
      conflict: status === 409 || error?.code === UNIQUE_VIOLATION,
      status,
      message: error?.message ?? `unexpected status ${status}`,
    };
  }
}
