#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runScrape } from "../commands/scrape";
import { loadScraperConfig } from "../config/scraperConfig";

interface ScrapeCliOptions {
  listUrl?: string;
  baseUrl?: string;
  diagnosis?: string;
  exclude?: string[];
  csv: string;
  imagesDir: string;
  userAgent?: string;
  timeout?: number;
  detailDelay?: number;
  imageDelay?: number;
  yes?: boolean;
  images: boolean;
}

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Expected an integer, got "${value}"`);
  }
  return parsed;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("colpo-atlas-scraper")
  .description("Colposcopy atlas case and image scraper")
  .version(pkg.version);

program.option("--env-file <path>", "Path to .env file (overrides DOTENV_CONFIG_PATH)", envPath);

program
  .command("scrape", { isDefault: true })
  .description("Collect cases from a list page, export CSV and optionally download images")
  .option("--list-url <url>", "Full list page URL (overrides --diagnosis/--exclude)", process.env.ATLAS_LIST_URL)
  .option("--base-url <url>", "Site base URL used to resolve links", process.env.ATLAS_BASE_URL)
  .option("--diagnosis <code>", "FinalDiag filter used to build the list URL")
  .option("--exclude <id...>", "Case ids excluded from the list URL")
  .option("--csv <path>", "CSV output path", "colposcopy_cases.csv")
  .option("--images-dir <dir>", "Root directory for downloaded images", "images")
  .option("--user-agent <ua>", "User-Agent header sent with every request")
  .option("--timeout <ms>", "Request timeout in milliseconds", parseInteger)
  .option("--detail-delay <ms>", "Pause after each detail page request", parseInteger)
  .option("--image-delay <ms>", "Pause after each downloaded image", parseInteger)
  .option("-y, --yes", "Download images without asking")
  .option("--no-images", "Skip the image download phase")
  .action(async (opts: ScrapeCliOptions) => {
    const config = loadScraperConfig({
      listUrl: opts.listUrl,
      baseUrl: opts.baseUrl,
      diagnosisCode: opts.diagnosis,
      excludedIds: opts.exclude,
      csvPath: opts.csv,
      imagesDir: opts.imagesDir,
      userAgent: opts.userAgent,
      timeoutMs: opts.timeout,
      detailDelayMs: opts.detailDelay,
      imageDelayMs: opts.imageDelay,
      downloadImages: !opts.images ? "no" : opts.yes ? "yes" : "ask"
    });
    await runScrape(config);
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
