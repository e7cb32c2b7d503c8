import { logger } from "../../common/src/logger.js";
import { countWords, type FailureReason, type PostRecord, type SiteConfig } from "../../common/src/types.js";
import { ModelObjectSchema, type ModelObject } from "./schema.js";

const REQUIRED_FIELDS = ["title", "content", "excerpt"] as const;
const TITLE_MAX = 70;
const EXCERPT_MAX = 200;
const META_TITLE_MAX = 70;
const META_DESCRIPTION_MAX = 200;
const DEFAULT_READ_TIME = 5;
const MIN_CONTENT_WORDS = 500;
const SNIPPET_LENGTH = 500;

export type ParseResult =
  | { ok: true; value: ModelObject }
  | { ok: false; failure: Extract<FailureReason, { kind: "parse" }> };

export type ValidationResult =
  | { valid: true; errors: []; warnings: string[]; record: PostRecord }
  | { valid: false; errors: string[]; warnings: string[] };

function tryParseObject(text: string): { value: ModelObject } | { error: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return { error: error instanceof Error ? error.message : String(error) };
  }

  if (Array.isArray(parsed)) {
    return { error: "expected a JSON object, got an array" };
  }
  const result = ModelObjectSchema.safeParse(parsed);
  if (!result.success) {
    return { error: `expected a JSON object, got ${parsed === null ? "null" : typeof parsed}` };
  }
  return { value: result.data };
}

export function repairModelText(text: string): string {
  const unfenced = text
    .trim()
    .replace(/^```[a-zA-Z]*\s*/, "")
    .replace(/\s*```$/, "");

  const start = unfenced.indexOf("{");
  const end = unfenced.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return unfenced;
  }
  return unfenced.slice(start, end + 1);
}

export function parseModelJson(text: string): ParseResult {
  const direct = tryParseObject(text.trim());
  if ("value" in direct) {
    return { ok: true, value: direct.value };
  }

  logger.warn("model response is not plain JSON, attempting repair", { message: direct.error });

  const repaired = repairModelText(text);
  const second = tryParseObject(repaired);
  if ("value" in second) {
    return { ok: true, value: second.value };
  }

  const snippet =
    repaired.length > SNIPPET_LENGTH ? `${repaired.slice(0, SNIPPET_LENGTH)}...` : repaired;
  return { ok: false, failure: { kind: "parse", message: second.error, snippet } };
}

function asText(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return "";
}

function truncate(value: string, max: number): string {
  const chars = Array.from(value);
  if (chars.length <= max) {
    return value;
  }
  return `${chars.slice(0, max - 3).join("")}...`;
}

function asStringList(value: unknown): string[] {
  if (typeof value === "string") {
    return value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
  if (Array.isArray(value)) {
    return value
      .map((item) => asText(item).trim())
      .filter((item) => item.length > 0);
  }
  return [];
}

function asReadTime(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return DEFAULT_READ_TIME;
}

export function normalizeCategory(category: string, site: SiteConfig): string {
  if (site.allowedCategories.includes(category)) {
    return category;
  }

  const lowered = category.trim().toLowerCase();
  if (lowered.length > 0) {
    const match = site.allowedCategories.find((allowed) => {
      const candidate = allowed.toLowerCase();
      return candidate.includes(lowered) || lowered.includes(candidate);
    });
    if (match) {
      logger.warn("category replaced by closest allowed category", {
        site: site.id,
        category,
        replacement: match,
      });
      return match;
    }
  }

  logger.warn("unknown category replaced by default", {
    site: site.id,
    category,
    replacement: site.defaultCategory,
  });
  return site.defaultCategory;
}

function truncateField(
  field: string,
  value: string,
  max: number,
  warnings: string[],
): string {
  const truncated = truncate(value, max);
  if (truncated !== value) {
    warnings.push(`${field} truncated to ${max} characters`);
    logger.warn("field truncated", { field, max, originalLength: Array.from(value).length });
  }
  return truncated;
}

export function validatePost(raw: ModelObject, site: SiteConfig): ValidationResult {
  const errors: string[] = [];
  for (const field of REQUIRED_FIELDS) {
    if (asText(raw[field]).trim().length === 0) {
      errors.push(`missing required field: ${field}`);
    }
  }
  if (errors.length > 0) {
    return { valid: false, errors, warnings: [] };
  }

  const warnings: string[] = [];
  const content = asText(raw.content);
  const record: PostRecord = {
    title: truncateField("title", asText(raw.title), TITLE_MAX, warnings),
    slug: asText(raw.slug).trim(),
    excerpt: truncateField("excerpt", asText(raw.excerpt), EXCERPT_MAX, warnings),
    content,
    category: normalizeCategory(asText(raw.category), site),
    tags: asStringList(raw.tags),
    author: asText(raw.author).trim() || null,
    readTime: asReadTime(raw.read_time),
  };

  if ("meta_title" in raw) {
    record.metaTitle = truncateField("meta_title", asText(raw.meta_title), META_TITLE_MAX, warnings);
  }
  if ("meta_description" in raw) {
    record.metaDescription = truncateField(
      "meta_description",
      asText(raw.meta_description),
      META_DESCRIPTION_MAX,
      warnings,
    );
  }
  if ("seo_keywords" in raw) {
    record.seoKeywords = asStringList(raw.seo_keywords);
  }

  const categorySlug = asText(raw.category_slug).trim();
  if (categorySlug) {
    record.categorySlug = categorySlug;
  }
  const categoryIcon = asText(raw.category_icon).trim();
  if (categoryIcon) {
    record.categoryIcon = categoryIcon;
  }

  const wordCount = countWords(content);
  if (wordCount < MIN_CONTENT_WORDS) {
    warnings.push(`content is short: ${wordCount} words`);
    logger.warn("generated content is shorter than expected", {
      site: site.id,
      wordCount,
      minimum: MIN_CONTENT_WORDS,
    });
  }

  return { valid: true, errors: [], warnings, record };
}
