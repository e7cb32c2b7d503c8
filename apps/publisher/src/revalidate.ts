import { normalizeError } from "../../common/src/errors.js";
import { logger } from "../../common/src/logger.js";
import type {
  CacheInvalidationStatus,
  SiteConfig,
  SiteCredentials,
} from "../../common/src/types.js";

const REVALIDATE_TIMEOUT_MS = 10_000;
const BLOG_PATH = "/blog";

export type CacheInvalidator = (site: SiteConfig) => Promise<CacheInvalidationStatus>;

export async function invalidateSiteCache(
  credentials: SiteCredentials,
  site: SiteConfig,
  fetchImpl: typeof fetch = fetch,
): Promise<Exclude<CacheInvalidationStatus, "not-attempted">> {
  if (!credentials.revalidateSecret) {
    logger.info("revalidate secret not set, cache will expire on its own", { site: site.id });
    return "skipped";
  }

  const url = `${credentials.siteUrl}/api/revalidate`;
  try {
    const response = await fetchImpl(url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ secret: credentials.revalidateSecret, path: BLOG_PATH }),
      signal: AbortSignal.timeout(REVALIDATE_TIMEOUT_MS),
    });

    if (response.status !== 200) {
      logger.warn("cache revalidation rejected", { site: site.id, url, status: response.status });
      return "failed";
    }

    logger.info("site cache revalidated", { site: site.id, path: BLOG_PATH });
    return "ok";
  } catch (error) {
    logger.warn("cache revalidation failed", { site: site.id, url, message: normalizeError(error) });
    return "failed";
  }
}
