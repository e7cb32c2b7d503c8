import { randomUUID } from "node:crypto";
import type { AppEnv } from "../../common/src/env.js";
import { normalizeError } from "../../common/src/errors.js";
import { logger } from "../../common/src/logger.js";
import { resolveSiteCredentials } from "../../common/src/sites.js";
import { makeUniqueSlug } from "../../common/src/slug.js";
import {
  POST_FIELDS,
  type FailureReason,
  type PostField,
  type PostRecord,
  type SiteConfig,
} from "../../common/src/types.js";
import { SupabasePostStore, type PostStore, type StoreRow } from "./store.js";

const DEFAULT_READ_TIME = 5;

export interface RemoteSaveResult {
  saved: boolean;
  slug: string;
  id: string | null;
  reason: FailureReason | null;
}

export interface PayloadContext {
  id: string;
  now: Date;
}

function fieldValue(record: Readonly<PostRecord>, field: PostField, slug: string): unknown {
  switch (field) {
    case "title":
      return record.title;
    case "slug":
      return slug;
    case "excerpt":
      return record.excerpt;
    case "content":
      return record.content;
    case "category":
      return record.category;
    case "tags":
      return record.tags;
    case "author":
      return record.author ?? "";
    case "read_time":
      return Number.isFinite(record.readTime) ? record.readTime : DEFAULT_READ_TIME;
    case "meta_title":
      return record.metaTitle ?? "";
    case "meta_description":
      return record.metaDescription ?? "";
    case "seo_keywords":
      return record.seoKeywords ?? [];
    case "category_slug":
      return record.categorySlug ?? "";
    case "category_icon":
      return record.categoryIcon ?? "";
  }
}

export function buildStorePayload(
  record: Readonly<PostRecord>,
  slug: string,
  site: SiteConfig,
  context: PayloadContext,
): StoreRow {
  const timestamp = context.now.toISOString();
  const row: StoreRow = { id: context.id };

  for (const field of POST_FIELDS) {
    const column = site.fieldMapping[field];
    if (column) {
      row[column] = fieldValue(record, field, slug);
    }
  }

  row.published_at = timestamp;
  row.updated_at = timestamp;
  row.created_at = timestamp;
  row.is_published = true;
  return row;
}

export interface RemoteSaveOptions {
  now?: Date;
  newId?: () => string;
  randomSuffix?: () => string;
}

export async function savePostRemote(
  record: Readonly<PostRecord>,
  store: PostStore,
  site: SiteConfig,
  options: RemoteSaveOptions = {},
): Promise<RemoteSaveResult> {
  const id = options.newId?.() ?? randomUUID();
  let slug = record.slug;

  try {
    slug = await makeUniqueSlug(store, record.slug, { randomSuffix: options.randomSuffix });
    const payload = buildStorePayload(record, slug, site, { id, now: options.now ?? new Date() });
    const result = await store.insert(payload);

    if (result.ok) {
      logger.info("post inserted into store", { site: site.id, id, slug });
      return { saved: true, slug, id, reason: null };
    }

    const reason: FailureReason = result.conflict
      ? { kind: "conflict", slug, message: result.message }
      : { kind: "api", status: result.status, body: result.message };

    logger.error("store insert rejected", {
      site: site.id,
      slug,
      status: result.status,
      conflict: result.conflict,
      message: result.message,
    });
    return { saved: false, slug, id: null, reason };
  } catch (error) {
    const message = normalizeError(error);
    logger.error("store insert failed", { site: site.id, slug, message });
    return { saved: false, slug, id: null, reason: { kind: "transport", message } };
  }
}

export function openSiteStore(site: SiteConfig, env: AppEnv): PostStore | null {
  const credentials = resolveSiteCredentials(site, env);
  if (!credentials.storeUrl || !credentials.storeKey) {
    logger.warn("remote store credentials missing, posts will be saved to files only", {
      site: site.id,
      urlKey: site.credentialKeys.storeUrl,
      keyKey: site.credentialKeys.storeKey,
    });
    return null;
  }

  return new SupabasePostStore({
    url: credentials.storeUrl,
    serviceKey: credentials.storeKey,
    readTimeoutMs: env.STORE_TIMEOUT_MS,
    insertTimeoutMs: env.STORE_INSERT_TIMEOUT_MS,
  });
}

export async function probeStore(store: PostStore | null, site: SiteConfig): Promise<boolean> {
  if (!store) {
    return false;
  }
  try {
    const result = await store.ping();
    if (!result.ok) {
      logger.warn("remote store unreachable", { site: site.id, message: result.message });
    }
    return result.ok;
  } catch (error) {
    logger.warn("remote store unreachable", { site: site.id, message: normalizeError(error) });
    return false;
  }
}
