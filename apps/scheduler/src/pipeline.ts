import type { AppEnv } from "../../common/src/env.js";
import { ConfigError, ValidationFailure, normalizeError } from "../../common/src/errors.js";
import { logger } from "../../common/src/logger.js";
import { wait, type Sleep } from "../../common/src/retry.js";
import { resolveSiteCredentials, selectAuthor } from "../../common/src/sites.js";
import { slugify } from "../../common/src/slug.js";
import { loadTopics, pickRandom, removeTopic, saveTopics } from "../../common/src/topic-queue.js";
import {
  countWords,
  describeFailure,
  type BatchReport,
  type CacheInvalidationStatus,
  type FailedPostSummary,
  type FailureReason,
  type GenerationOutcome,
  type PostRecord,
  type SiteConfig,
  type SuccessfulPostSummary,
} from "../../common/src/types.js";
import { GenerationClient, type PostGenerator } from "../../producer/src/client.js";
import { createPromptRenderer } from "../../producer/src/genkit.js";
import { validatePost } from "../../producer/src/response.js";
import { saveBatchReport, savePostFile, type FileSaveResult } from "../../publisher/src/files.js";
import {
  openSiteStore,
  probeStore,
  savePostRemote,
  type RemoteSaveResult,
} from "../../publisher/src/gateway.js";
import { invalidateSiteCache, type CacheInvalidator } from "../../publisher/src/revalidate.js";
import type { PostStore } from "../../publisher/src/store.js";
import type { GenerationSession } from "./session.js";

export interface PipelineDeps {
  generator: PostGenerator;
  topicsDir: string;
  openStore: (site: SiteConfig) => PostStore | null;
  invalidateCache: CacheInvalidator;
  outputDir: string;
  reportsDir: string;
  sleep: Sleep;
  now: () => Date;
  random: () => number;
  newId?: () => string;
  randomSuffix?: () => string;
}

export interface BatchOptions {
  site: SiteConfig;
  count: number;
  pacingMs: number;
}

export function createPipelineDeps(env: AppEnv): PipelineDeps {
  if (!env.GPT_API_KEY) {
    throw new ConfigError("GPT_API_KEY is not set");
  }

  return {
    generator: GenerationClient.fromEnv(env, createPromptRenderer(env.PROMPT_DIR)),
    topicsDir: env.TOPICS_DIR,
    openStore: (site) => openSiteStore(site, env),
    invalidateCache: (site) => invalidateSiteCache(resolveSiteCredentials(site, env), site),
    outputDir: env.OUTPUT_DIR,
    reportsDir: env.REPORTS_DIR,
    sleep: wait,
    now: () => new Date(),
    random: Math.random,
  };
}

export function decideOutcome(
  topic: string,
  record: Readonly<PostRecord>,
  warnings: string[],
  file: FileSaveResult,
  remote: RemoteSaveResult | null,
): GenerationOutcome {
  const storeSaved = remote?.saved ?? false;
  if (file.saved || storeSaved) {
    return {
      kind: "success",
      topic,
      record,
      fileSaved: file.saved,
      storeSaved,
      storeSlug: storeSaved && remote ? remote.slug : null,
      filePath: file.filePath,
      warnings,
    };
  }

  return {
    kind: "failure",
    topic,
    reason: {
      kind: "persistence",
      fileError: file.error,
      storeError: remote?.reason ? describeFailure(remote.reason) : null,
    },
  };
}

export function finalizeRecord(
  record: PostRecord,
  site: SiteConfig,
  random: () => number,
): { ok: true; record: Readonly<PostRecord> } | { ok: false; failure: FailureReason } {
  const slug = slugify(record.slug) || slugify(record.title);
  if (slug.length === 0) {
    return {
      ok: false,
      failure: { kind: "validation", errors: ["slug could not be derived from the title"] },
    };
  }

  const finalized: PostRecord = {
    ...record,
    slug,
    tags: [...record.tags],
    author: record.author ?? selectAuthor(site, record.category, random).name,
  };
  if (record.seoKeywords) {
    finalized.seoKeywords = [...record.seoKeywords];
  }

  if (site.categoryIcons) {
    finalized.categorySlug = record.categorySlug ?? slugify(record.category);
    finalized.categoryIcon =
      record.categoryIcon ?? site.categoryIcons[record.category] ?? site.fallbackIcon;
  }

  Object.freeze(finalized.tags);
  if (finalized.seoKeywords) {
    Object.freeze(finalized.seoKeywords);
  }
  return { ok: true, record: Object.freeze(finalized) };
}

async function produceOne(
  deps: PipelineDeps,
  site: SiteConfig,
  topic: string,
  store: PostStore | null,
): Promise<GenerationOutcome> {
  const log = logger.child({ site: site.id, topic });

  const generated = await deps.generator.generate(topic, site);
  if (!generated.ok) {
    log.warn("generation failed", { reason: describeFailure(generated.failure) });
    return { kind: "failure", topic, reason: generated.failure };
  }

  const validation = validatePost(generated.raw, site);
  if (!validation.valid) {
    log.warn("model output rejected", { errors: validation.errors });
    return { kind: "failure", topic, reason: { kind: "validation", errors: validation.errors } };
  }

  const finalized = finalizeRecord(validation.record, site, deps.random);
  if (!finalized.ok) {
    log.warn("model output rejected", { reason: describeFailure(finalized.failure) });
    return { kind: "failure", topic, reason: finalized.failure };
  }
  const record = finalized.record;

  const file = await savePostFile(record, topic, site, deps.outputDir, deps.now());
  const remote = store
    ? await savePostRemote(record, store, site, {
        now: deps.now(),
        newId: deps.newId,
        randomSuffix: deps.randomSuffix,
      })
    : null;

  const outcome = decideOutcome(topic, record, validation.warnings, file, remote);
  if (outcome.kind === "success") {
    log.info("post generated", {
      title: record.title,
      slug: outcome.storeSlug ?? record.slug,
      category: record.category,
      fileSaved: outcome.fileSaved,
      storeSaved: outcome.storeSaved,
    });
  } else {
    log.error("post could not be persisted", { reason: describeFailure(outcome.reason) });
  }
  return outcome;
}

export async function generateOne(
  deps: PipelineDeps,
  session: GenerationSession,
  site: SiteConfig,
  topic: string,
): Promise<GenerationOutcome> {
  return session.exclusive(async () => {
    const store = deps.openStore(site);
    const storeAvailable = await probeStore(store, site);
    return produceOne(deps, site, topic, storeAvailable ? store : null);
  });
}

function emptyReport(
  site: SiteConfig,
  timestamp: Date,
  requestedOriginal: number,
  remainingTopics: number,
  queueUnavailable: boolean,
): BatchReport {
  return {
    timestamp: timestamp.toISOString(),
    site: site.id,
    requested: 0,
    requestedOriginal,
    reduced: requestedOriginal > 0,
    succeeded: 0,
    failed: 0,
    storeSaved: 0,
    cancelled: false,
    queueUnavailable,
    successfulPosts: [],
    failedPosts: [],
    remainingTopics,
    cacheInvalidation: "not-attempted",
    reportPath: null,
  };
}

async function runBatch(
  deps: PipelineDeps,
  session: GenerationSession,
  options: BatchOptions,
): Promise<BatchReport> {
  const { site } = options;
  const log = logger.child({ site: site.id });

  const loaded = await loadTopics(deps.topicsDir, site);
  if (!loaded.ok || loaded.topics.length === 0) {
    log.warn("nothing to generate", {
      queueUnavailable: !loaded.ok,
      requested: options.count,
    });
    return emptyReport(site, deps.now(), options.count, 0, !loaded.ok);
  }

  let topics = loaded.topics;
  const count = Math.min(options.count, topics.length);
  if (count < options.count) {
    log.warn("requested more posts than topics available, reducing batch", {
      requested: options.count,
      available: topics.length,
    });
  }

  const store = deps.openStore(site);
  const storeAvailable = await probeStore(store, site);
  const reachableStore = storeAvailable ? store : null;

  log.info("batch started", {
    count,
    available: topics.length,
    pacingMs: options.pacingMs,
    storeAvailable,
  });

  const successfulPosts: SuccessfulPostSummary[] = [];
  const failedPosts: FailedPostSummary[] = [];
  let cancelled = false;

  for (let index = 0; index < count; index += 1) {
    if (session.cancellationRequested) {
      cancelled = true;
      log.warn("batch cancelled", { completed: index, count });
      break;
    }

    const topic = pickRandom(topics, deps.random);
    if (topic === null) {
      break;
    }

    const number = index + 1;
    log.info("batch item started", { number, count, topic });

    let outcome: GenerationOutcome;
    try {
      outcome = await produceOne(deps, site, topic, reachableStore);
    } catch (error) {
      outcome = {
        kind: "failure",
        topic,
        reason: { kind: "transport", message: normalizeError(error) },
      };
    }

    if (outcome.kind === "success") {
      topics = removeTopic(topics, topic);
      successfulPosts.push({
        number,
        topic,
        postTitle: outcome.record.title,
        slug: outcome.storeSlug ?? outcome.record.slug,
        category: outcome.record.category,
        wordCount: countWords(outcome.record.content),
        fileSaved: outcome.fileSaved,
        storeSaved: outcome.storeSaved,
      });
    } else {
      failedPosts.push({ number, topic, reason: describeFailure(outcome.reason) });
    }

    if (index < count - 1 && !session.cancellationRequested) {
      await deps.sleep(options.pacingMs);
    }
  }

  if (successfulPosts.length > 0) {
    try {
      await saveTopics(deps.topicsDir, topics, site);
    } catch (error) {
      log.error("topic queue could not be saved, consumed topics may be generated again", {
        message: normalizeError(error),
      });
    }
  }

  let cacheInvalidation: CacheInvalidationStatus = "not-attempted";
  if (successfulPosts.length > 0 && storeAvailable) {
    cacheInvalidation = await deps.invalidateCache(site);
  }

  const report: BatchReport = {
    timestamp: deps.now().toISOString(),
    site: site.id,
    requested: count,
    requestedOriginal: options.count,
    reduced: count < options.count,
    succeeded: successfulPosts.length,
    failed: failedPosts.length,
    storeSaved: successfulPosts.filter((post) => post.storeSaved).length,
    cancelled,
    queueUnavailable: false,
    successfulPosts,
    failedPosts,
    remainingTopics: topics.length,
    cacheInvalidation,
    reportPath: null,
  };

  log.info("batch finished", {
    requested: report.requested,
    succeeded: report.succeeded,
    failed: report.failed,
    storeSaved: report.storeSaved,
    remainingTopics: report.remainingTopics,
    cancelled,
  });
  return report;
}

export async function generateBatch(
  deps: PipelineDeps,
  session: GenerationSession,
  options: BatchOptions,
): Promise<BatchReport> {
  if (!Number.isInteger(options.count) || options.count < 1) {
    throw new ValidationFailure("count must be a positive integer");
  }
  if (!Number.isFinite(options.pacingMs) || options.pacingMs < 0) {
    throw new ValidationFailure("pacing delay must be a non-negative number");
  }

  return session.exclusive(async () => {
    const report = await runBatch(deps, session, options);
    const reportPath = await saveBatchReport(report, deps.reportsDir);
    const finalReport: BatchReport = { ...report, reportPath };
    session.recordBatch(finalReport);
    return finalReport;
  });
}
