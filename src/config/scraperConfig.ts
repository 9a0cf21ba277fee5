import { z } from "zod";
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from "../http/client";

export const DEFAULT_BASE_URL = "https://screening.iarc.fr";
export const LIST_PAGE_PATH = "atlascolpodiag_list.php";
export const DEFAULT_DIAGNOSIS_CODE = "31";
export const DEFAULT_EXCLUDED_IDS = [
  "0", "1", "2", "3", "8", "10", "15", "19", "30", "31", "43", "46",
  "47", "60", "61", "68", "73", "83", "88", "89", "93", "96", "102", "105", "111"
];
export const DEFAULT_DETAIL_DELAY_MS = 1000;
export const DEFAULT_IMAGE_DELAY_MS = 500;

export const ScraperConfigSchema = z
  .object({
    baseUrl: z.string().url().default(DEFAULT_BASE_URL),
    listUrl: z.string().url().optional(),
    diagnosisCode: z.string().min(1).default(DEFAULT_DIAGNOSIS_CODE),
    excludedIds: z.array(z.string().min(1)).default(DEFAULT_EXCLUDED_IDS),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    detailDelayMs: z.number().int().nonnegative().default(DEFAULT_DETAIL_DELAY_MS),
    imageDelayMs: z.number().int().nonnegative().default(DEFAULT_IMAGE_DELAY_MS),
    csvPath: z.string().min(1).default("colposcopy_cases.csv"),
    imagesDir: z.string().min(1).default("images"),
    downloadImages: z.enum(["ask", "yes", "no"]).default("ask")
  })
  .transform((config) => ({
    ...config,
    listUrl: config.listUrl ?? buildListUrl(config.baseUrl, config.diagnosisCode, config.excludedIds)
  }));

export type ScraperConfigInput = z.input<typeof ScraperConfigSchema>;
export type ScraperConfig = z.output<typeof ScraperConfigSchema>;

export function buildListUrl(baseUrl: string, diagnosisCode: string, excludedIds: string[]): string {
  const url = new URL(LIST_PAGE_PATH, baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`);
  const excluded = excludedIds.map((id) => encodeURIComponent(id)).join(",");
  return `${url.toString()}?FinalDiag=${encodeURIComponent(diagnosisCode)}&e=,${excluded}`;
}

export function loadScraperConfig(input: ScraperConfigInput): ScraperConfig {
  return ScraperConfigSchema.parse(input);
}
