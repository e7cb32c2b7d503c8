import type { CredentialKey } from "./env.js";

export const SITE_IDS = ["mfo", "hr"] as const;

export type SiteId = (typeof SITE_IDS)[number];

export const POST_FIELDS = [
  "title",
  "slug",
  "excerpt",
  "content",
  "category",
  "tags",
  "author",
  "read_time",
  "meta_title",
  "meta_description",
  "seo_keywords",
  "category_slug",
  "category_icon",
] as const;

export type PostField = (typeof POST_FIELDS)[number];

export interface AuthorProfile {
  name: string;
  role: string;
  categories: string[];
}

export interface SiteConfig {
  id: SiteId;
  name: string;
  topicFile: string;
  promptName: string;
  credentialKeys: {
    storeUrl: CredentialKey;
    storeKey: CredentialKey;
    siteUrl: CredentialKey;
    revalidateSecret: CredentialKey;
  };
  defaultAuthor: string | null;
  authorPool: AuthorProfile[];
  allowedCategories: string[];
  defaultCategory: string;
  fieldMapping: Partial<Record<PostField, string>>;
  categoryIcons?: Record<string, string>;
  fallbackIcon?: string;
}

export interface SiteCredentials {
  storeUrl: string | null;
  storeKey: string | null;
  siteUrl: string;
  revalidateSecret: string | null;
}

export interface PostRecord {
  title: string;
  slug: string;
  excerpt: string;
  content: string;
  category: string;
  tags: string[];
  author: string | null;
  readTime: number;
  metaTitle?: string;
  metaDescription?: string;
  seoKeywords?: string[];
  categorySlug?: string;
  categoryIcon?: string;
}

export type FailureReason =
  | { kind: "parse"; message: string; snippet: string }
  | { kind: "validation"; errors: string[] }
  | { kind: "api"; status: number; body: string }
  | { kind: "transport"; message: string }
  | { kind: "conflict"; slug: string; message: string }
  | { kind: "persistence"; fileError: string | null; storeError: string | null };

export type GenerationOutcome =
  | {
      kind: "success";
      topic: string;
      record: Readonly<PostRecord>;
      fileSaved: boolean;
      storeSaved: boolean;
      storeSlug: string | null;
      filePath: string | null;
      warnings: string[];
    }
  | { kind: "failure"; topic: string; reason: FailureReason };

export interface SuccessfulPostSummary {
  number: number;
  topic: string;
  postTitle: string;
  slug: string;
  category: string;
  wordCount: number;
  fileSaved: boolean;
  storeSaved: boolean;
}

export interface FailedPostSummary {
  number: number;
  topic: string;
  reason: string;
}

export type CacheInvalidationStatus = "ok" | "failed" | "skipped" | "not-attempted";

export interface BatchReport {
  timestamp: string;
  site: SiteId;
  requested: number;
  requestedOriginal: number;
  reduced: boolean;
  succeeded: number;
  failed: number;
  storeSaved: number;
  cancelled: boolean;
  queueUnavailable: boolean;
  successfulPosts: SuccessfulPostSummary[];
  failedPosts: FailedPostSummary[];
  remainingTopics: number;
  cacheInvalidation: CacheInvalidationStatus;
  reportPath: string | null;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

function shorten(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max)}...` : value;
}

export function describeFailure(reason: FailureReason): string {
  switch (reason.kind) {
    case "parse":
      return `model response is not valid JSON: ${reason.message}`;
    case "validation":
      return `validation failed: ${reason.errors.join("; ")}`;
    case "api":
      return `API error ${reason.status}: ${shorten(reason.body, 200)}`;
    case "transport":
      return `request failed: ${reason.message}`;
    case "conflict":
      return `slug conflict for '${reason.slug}': ${reason.message}`;
    case "persistence":
      return `save failed (file: ${reason.fileError ?? "not attempted"}; store: ${
        reason.storeError ?? "not attempted"
      })`;
  }
}
