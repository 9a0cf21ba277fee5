import path from "path";
import { ImageArchiver, ArchiveResult } from "../archive/imageArchiver";
import { askYesNo } from "../cli/confirm";
import { CaseCollector } from "../collect/caseCollector";
import { ScraperConfig } from "../config/scraperConfig";
import { exportCasesToCsv, ExportResult } from "../export/csvExport";
import { Fetcher, HttpClient } from "../http/client";
import { Clock, RateLimiter, systemClock } from "../http/rateLimiter";
import { CaseRecord } from "../types/caseRecord";
import { Logger, createConsoleLogger } from "../utils/log";

export const DOWNLOAD_PROMPT = "Do you want to download all images? (y/n): ";
const RULE = "=".repeat(70);

export interface ScrapeDependencies {
  fetcher?: Fetcher;
  clock?: Clock;
  logger?: Logger;
  confirm?: (question: string) => Promise<boolean>;
}

export interface ScrapeSummary {
  records: CaseRecord[];
  export: ExportResult | null;
  archive: ArchiveResult | null;
}

async function shouldDownload(
  config: ScraperConfig,
  confirm: (question: string) => Promise<boolean>
): Promise<boolean> {
  if (config.downloadImages === "yes") return true;
  if (config.downloadImages === "no") return false;
  return confirm(DOWNLOAD_PROMPT);
}

export async function runScrape(config: ScraperConfig, deps: ScrapeDependencies = {}): Promise<ScrapeSummary> {
  const logger = deps.logger ?? createConsoleLogger("scrape");
  const clock = deps.clock ?? systemClock;
  const fetcher =
    deps.fetcher ?? new HttpClient({ userAgent: config.userAgent, timeoutMs: config.timeoutMs });

  logger.info(RULE);
  logger.info("Colposcopy Atlas Scraper");
  logger.info(RULE);

  const collector = new CaseCollector({
    fetcher,
    baseUrl: config.baseUrl,
    detailLimiter: new RateLimiter(config.detailDelayMs, clock),
    logger
  });
  const collection = await collector.run(config.listUrl);
  const records = collection.records;

  if (!records.length) {
    logger.info("No cases were scraped.");
    return { records, export: null, archive: null };
  }

  logger.info(`Cases collected: ${records.length} (detail failures: ${collection.detailFailures.length})`);
  const exported = await exportCasesToCsv(records, path.resolve(config.csvPath), logger);

  logger.info(RULE);
  if (!(await shouldDownload(config, deps.confirm ?? askYesNo))) {
    logger.info("Skipping image download.");
    return { records, export: exported, archive: null };
  }

  const archiver = new ImageArchiver({
    fetcher,
    imageLimiter: new RateLimiter(config.imageDelayMs, clock),
    logger
  });
  const archived = await archiver.archive(records, path.resolve(config.imagesDir));

  logger.info(RULE);
  logger.info("All done!");
  logger.info(RULE);
  return { records, export: exported, archive: archived };
}
