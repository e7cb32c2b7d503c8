import path from "node:path";
import { normalizeError } from "../../common/src/errors.js";
import { logger } from "../../common/src/logger.js";
import type { BatchReport, PostRecord, SiteConfig } from "../../common/src/types.js";
import { writeAtomic } from "../../common/src/writer.js";

const FILE_TOPIC_MAX = 50;

export interface FileSaveResult {
  saved: boolean;
  filePath: string | null;
  error: string | null;
}

export function topicFileStem(topic: string): string {
  const cleaned = topic
    .replace(/[?:]/g, "")
    .replace(/[^\p{L}\p{N}_\s-]/gu, "")
    .trim()
    .replace(/\s+/g, "_");
  const capped = Array.from(cleaned).slice(0, FILE_TOPIC_MAX).join("");
  return capped.length > 0 ? capped : "untitled";
}

export function postFilePath(outputDir: string, site: SiteConfig, topic: string): string {
  return path.resolve(outputDir, site.id, `generated_post_${topicFileStem(topic)}.json`);
}

export async function savePostFile(
  record: Readonly<PostRecord>,
  topic: string,
  site: SiteConfig,
  outputDir: string,
  now: Date = new Date(),
): Promise<FileSaveResult> {
  const filePath = postFilePath(outputDir, site, topic);
  const document = {
    site: site.id,
    topic,
    generatedAt: now.toISOString(),
    post: record,
  };

  try {
    await writeAtomic(filePath, `${JSON.stringify(document, null, 2)}\n`);
    logger.info("post saved to file", { site: site.id, filePath });
    return { saved: true, filePath, error: null };
  } catch (error) {
    const message = normalizeError(error);
    logger.error("post file save failed", { site: site.id, filePath, message });
    return { saved: false, filePath: null, error: message };
  }
}

function compactTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, "")}_${iso.slice(11, 19).replace(/:/g, "")}`;
}

export function batchReportPath(reportsDir: string, report: BatchReport): string {
  return path.resolve(
    reportsDir,
    `batch_report_${report.site}_${compactTimestamp(new Date(report.timestamp))}.json`,
  );
}

export async function saveBatchReport(
  report: BatchReport,
  reportsDir: string,
): Promise<string | null> {
  const filePath = batchReportPath(reportsDir, report);
  try {
    await writeAtomic(filePath, `${JSON.stringify({ ...report, reportPath: filePath }, null, 2)}\n`);
    return filePath;
  } catch (error) {
    logger.warn("batch report could not be saved", {
      site: report.site,
      filePath,
      message: normalizeError(error),
    });
    return null;
  }
}
