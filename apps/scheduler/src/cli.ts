import { getEnv } from "../../common/src/env.js";
import { ValidationFailure, normalizeError } from "../../common/src/errors.js";
import { logger } from "../../common/src/logger.js";
import { getSiteConfig, resolveSiteIds } from "../../common/src/sites.js";
import { addTopic, loadTopics } from "../../common/src/topic-queue.js";
import { openSiteStore, probeStore } from "../../publisher/src/gateway.js";
import { createPipelineDeps, generateBatch } from "./pipeline.js";
import { GenerationSession, createInterruptHandler } from "./session.js";

const USAGE = [
  "usage:",
  "  cli generate --site <mfo|hr|all> [--count N] [--delay seconds]",
  "  cli topics --site <mfo|hr> [--limit N]",
  "  cli add-topic --site <mfo|hr> --topic <text>",
  "  cli check --site <mfo|hr|all>",
].join("\n");

function getArg(name: string): string | undefined {
  const index = process.argv.findIndex((arg) => arg === `--${name}`);
  if (index === -1) {
    return undefined;
  }
  return process.argv[index + 1];
}

function requireArg(name: string): string {
  const value = getArg(name);
  if (!value) {
    throw new ValidationFailure(`--${name} is required\n${USAGE}`);
  }
  return value;
}

function numberArg(name: string, fallback: number): number {
  const raw = getArg(name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationFailure(`--${name} must be a non-negative number`);
  }
  return value;
}

async function runGenerate(): Promise<void> {
  const env = getEnv();
  const siteIds = resolveSiteIds(requireArg("site"));
  const count = numberArg("count", 1);
  const pacingMs = numberArg("delay", env.BATCH_DELAY_SECONDS) * 1000;

  const deps = createPipelineDeps(env);
  const session = new GenerationSession();

  const onInterrupt = createInterruptHandler(session, (code) => process.exit(code));
  process.on("SIGINT", onInterrupt);

  try {
    for (const siteId of siteIds) {
      const report = await generateBatch(deps, session, {
        site: getSiteConfig(siteId),
        count,
        pacingMs,
      });

      logger.info("batch report", {
        site: report.site,
        succeeded: report.succeeded,
        failed: report.failed,
        storeSaved: report.storeSaved,
        remainingTopics: report.remainingTopics,
        cacheInvalidation: report.cacheInvalidation,
        reportPath: report.reportPath,
      });

      if (report.cancelled) {
        break;
      }
    }
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

async function runTopics(): Promise<void> {
  const env = getEnv();
  const site = getSiteConfig(requireArg("site"));
  const limit = numberArg("limit", 20);

  const loaded = await loadTopics(env.TOPICS_DIR, site);
  if (!loaded.ok) {
    throw loaded.error;
  }

  console.log(`${site.name}: ${loaded.topics.length} topics queued`);
  for (const [index, topic] of loaded.topics.slice(0, limit).entries()) {
    console.log(`${index + 1}. ${topic}`);
  }
}

async function runAddTopic(): Promise<void> {
  const env = getEnv();
  const site = getSiteConfig(requireArg("site"));
  const total = await addTopic(env.TOPICS_DIR, site, requireArg("topic"));
  console.log(`${site.name}: ${total} topics queued`);
}

async function runCheck(): Promise<void> {
  const env = getEnv();
  let unreachable = 0;

  for (const siteId of resolveSiteIds(requireArg("site"))) {
    const site = getSiteConfig(siteId);
    const reachable = await probeStore(openSiteStore(site, env), site);
    console.log(`${site.id}: store ${reachable ? "reachable" : "unreachable"}`);
    if (!reachable) {
      unreachable += 1;
    }
  }

  if (unreachable > 0) {
    process.exitCode = 1;
  }
}

async function main(): Promise<void> {
  const command = process.argv[2];

  switch (command) {
    case "generate":
      await runGenerate();
      return;
    case "topics":
      await runTopics();
      return;
    case "add-topic":
      await runAddTopic();
      return;
    case "check":
      await runCheck();
      return;
    default:
      console.error(USAGE);
      process.exitCode = 1;
  }
}

main().catch((error) => {
  logger.error("command failed", { message: normalizeError(error) });
  process.exitCode = 1;
});
