import { randomBytes } from "node:crypto";
import { normalizeError } from "./errors.js";
import { logger } from "./logger.js";

const TRANSLIT_MAP: Record<string, string> = {
  а: "a",
  б: "b",
  в: "v",
  г: "g",
  д: "d",
  е: "e",
  ё: "yo",
  ж: "zh",
  з: "z",
  и: "i",
  й: "y",
  к: "k",
  л: "l",
  м: "m",
  н: "n",
  о: "o",
  п: "p",
  р: "r",
  с: "s",
  т: "t",
  у: "u",
  ф: "f",
  х: "h",
  ц: "ts",
  ч: "ch",
  ш: "sh",
  щ: "sch",
  ъ: "",
  ы: "y",
  ь: "",
  э: "e",
  ю: "yu",
  я: "ya",
};

const MAX_SEQUENTIAL_SUFFIX = 100;

export interface SlugLookup {
  slugExists(slug: string): Promise<boolean>;
}

export function slugify(text: string): string {
  const transliterated = Array.from(text.toLowerCase())
    .map((char) => TRANSLIT_MAP[char] ?? char)
    .join("");

  return transliterated
    .replace(/[^a-z0-9\s-]/g, "")
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
}

async function exists(lookup: SlugLookup, slug: string): Promise<boolean> {
  try {
    return await lookup.slugExists(slug);
  } catch (error) {
    logger.warn("slug existence check failed", { slug, message: normalizeError(error) });
    return false;
  }
}

export interface MakeUniqueOptions {
  randomSuffix?: () => string;
}

export async function makeUniqueSlug(
  lookup: SlugLookup,
  slug: string,
  options: MakeUniqueOptions = {},
): Promise<string> {
  if (!(await exists(lookup, slug))) {
    return slug;
  }

  for (let counter = 2; counter <= MAX_SEQUENTIAL_SUFFIX; counter += 1) {
    const candidate = `${slug}-${counter}`;
    if (!(await exists(lookup, candidate))) {
      logger.warn("slug already taken, using suffixed slug", { slug, candidate });
      return candidate;
    }
  }

  const suffix = options.randomSuffix?.() ?? randomBytes(3).toString("hex");
  const fallback = `${slug}-${suffix}`;
  logger.warn("sequential slug suffixes exhausted, using random suffix", {
    slug,
    candidate: fallback,
  });
  return fallback;
}
