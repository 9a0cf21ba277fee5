import { Fetcher } from "../http/client";
import { RateLimiter } from "../http/rateLimiter";
import { parseListPage } from "../parse/listPage";
import { parseDetailPage } from "../parse/detailPage";
import { CaseRecord, recordFromStub } from "../types/caseRecord";
import { Logger, createConsoleLogger } from "../utils/log";

export interface CaseCollectorOptions {
  fetcher: Fetcher;
  baseUrl: string;
  detailLimiter: RateLimiter;
  logger?: Logger;
}

export interface CollectionResult {
  records: CaseRecord[];
  listFetched: boolean;
  tableFound: boolean;
  detailFailures: string[];
}

export class CaseCollector {
  private readonly fetcher: Fetcher;
  private readonly baseUrl: string;
  private readonly detailLimiter: RateLimiter;
  private readonly logger: Logger;

  constructor(options: CaseCollectorOptions) {
    this.fetcher = options.fetcher;
    this.baseUrl = options.baseUrl;
    this.detailLimiter = options.detailLimiter;
    this.logger = options.logger ?? createConsoleLogger("collector");
  }

  async run(listUrl: string): Promise<CollectionResult> {
    this.logger.info(`Fetching list page: ${listUrl}`);
    const listResponse = await this.fetcher.fetchText(listUrl);
    if (!listResponse.ok) {
      this.logger.error("Error fetching list page", listResponse.error);
      return { records: [], listFetched: false, tableFound: false, detailFailures: [] };
    }

    const listing = parseListPage(listResponse.body, this.baseUrl);
    if (!listing.tableFound) {
      this.logger.warn("No table found on page");
    }
    for (const stub of listing.stubs) {
      this.logger.info(`Found Case ${stub.case_number} (ID: ${stub.case_id ?? "none"})`);
    }
    this.logger.info(`Total cases found on list page: ${listing.stubs.length}`);

    const records: CaseRecord[] = [];
    const detailFailures: string[] = [];
    const total = listing.stubs.length;

    for (const [index, stub] of listing.stubs.entries()) {
      this.logger.info(`Processing case ${index + 1}/${total}: ${stub.case_number}`);

      if (!stub.detail_link) {
        this.logger.warn(`No detail link for case ${stub.case_number}`);
        records.push(recordFromStub(stub));
        continue;
      }

      this.logger.info(`Fetching detail page: ${stub.detail_link}`);
      const detailResponse = await this.fetcher.fetchText(stub.detail_link);
      if (detailResponse.ok) {
        const record = parseDetailPage(detailResponse.body, stub, {
          baseUrl: this.baseUrl,
          logger: this.logger
        });
        this.logger.info(`Found ${record.images.length} images for case ${stub.case_number}`);
        records.push(record);
      } else {
        this.logger.error(`Error fetching detail page for case ${stub.case_number}`, detailResponse.error);
        detailFailures.push(stub.case_number);
        records.push(recordFromStub(stub));
      }

      await this.detailLimiter.afterRequest();
    }

    return { records, listFetched: true, tableFound: listing.tableFound, detailFailures };
  }
}
