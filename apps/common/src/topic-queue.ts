import { readFile } from "node:fs/promises";
import path from "node:path";
import { QueueUnavailableError, ValidationFailure, normalizeError } from "./errors.js";
import { logger } from "./logger.js";
import type { SiteConfig } from "./types.js";
import { writeAtomic } from "./writer.js";

export type TopicLoadResult =
  | { ok: true; topics: string[] }
  | { ok: false; topics: []; error: QueueUnavailableError };

export function parseTopics(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function pickRandom(topics: readonly string[], random: () => number = Math.random): string | null {
  if (topics.length === 0) {
    return null;
  }
  const index = Math.min(topics.length - 1, Math.floor(random() * topics.length));
  return topics[index];
}

export function removeTopic(topics: readonly string[], topic: string): string[] {
  const index = topics.indexOf(topic);
  if (index === -1) {
    logger.warn("topic not found in queue", { topic });
    return [...topics];
  }
  return [...topics.slice(0, index), ...topics.slice(index + 1)];
}

export function topicFilePath(directory: string, site: SiteConfig): string {
  return path.resolve(directory, site.topicFile);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function loadTopics(directory: string, site: SiteConfig): Promise<TopicLoadResult> {
  const filePath = topicFilePath(directory, site);
  try {
    const raw = await readFile(filePath, "utf8");
    return { ok: true, topics: parseTopics(raw) };
  } catch (error) {
    logger.warn("topic queue could not be read", {
      site: site.id,
      filePath,
      message: normalizeError(error),
    });
    return {
      ok: false,
      topics: [],
      error: new QueueUnavailableError(filePath, isMissingFile(error), error),
    };
  }
}

export async function saveTopics(
  directory: string,
  topics: readonly string[],
  site: SiteConfig,
): Promise<void> {
  const body = topics.length > 0 ? `${topics.join("\n")}\n` : "";
  await writeAtomic(topicFilePath(directory, site), body);
}

export async function addTopic(directory: string, site: SiteConfig, topic: string): Promise<number> {
  const trimmed = topic.trim();
  if (trimmed.length === 0) {
    throw new ValidationFailure("topic must not be blank");
  }
  if (/[\r\n]/.test(trimmed)) {
    throw new ValidationFailure("topic must be a single line");
  }

  const loaded = await loadTopics(directory, site);
  if (!loaded.ok && !loaded.error.missing) {
    throw loaded.error;
  }

  const next = [...loaded.topics, trimmed];
  await saveTopics(directory, next, site);

  logger.info("topic added", { site: site.id, topic: trimmed, total: next.length });
  return next.length;
}
