import * as cheerio from "cheerio";
import { DocumentIndex } from "../dom/traverse";
import { CaseRecord, CaseStub, UNKNOWN, recordFromStub } from "../types/caseRecord";
import { Logger, createConsoleLogger } from "../utils/log";
import { CONTENT_SELECTOR } from "./listPage";
import {
  DetailContext,
  DetailRule,
  extractAge,
  extractHpvStatus,
  extractImages,
  extractManagement,
  extractProvisionalDiagnosis,
  extractSwedeScore
} from "./detailRules";

export interface DetailParseOptions {
  baseUrl: string;
  logger?: Logger;
}

function applyRule<T>(
  name: string,
  rule: DetailRule<T>,
  ctx: DetailContext,
  fallback: T,
  logger: Logger
): T {
  try {
    return rule(ctx);
  } catch (error) {
    logger.error(`Rule ${name} failed, using fallback`, error);
    return fallback;
  }
}

export function parseDetailPage(html: string, stub: CaseStub, options: DetailParseOptions): CaseRecord {
  const logger = options.logger ?? createConsoleLogger("detail");
  const record = recordFromStub(stub);
  const $ = cheerio.load(html);
  const container = $(CONTENT_SELECTOR).first();

  if (!container.length) {
    logger.warn(`Could not find content container for case ${stub.case_number}`);
    return record;
  }

  const ctx: DetailContext = { $, index: new DocumentIndex($), container, baseUrl: options.baseUrl };

  return {
    ...record,
    age: applyRule("age", extractAge, ctx, UNKNOWN, logger),
    hpv_status: applyRule("hpv_status", extractHpvStatus, ctx, UNKNOWN, logger),
    provisional_diagnosis: applyRule(
      "provisional_diagnosis",
      extractProvisionalDiagnosis,
      ctx,
      null,
      logger
    ),
    management: applyRule("management", extractManagement, ctx, null, logger),
    swede_score: applyRule("swede_score", extractSwedeScore, ctx, null, logger),
    images: applyRule("images", extractImages, ctx, [], logger)
  };
}
