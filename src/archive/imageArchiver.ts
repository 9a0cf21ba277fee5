import { Fetcher } from "../http/client";
import { RateLimiter } from "../http/rateLimiter";
import { caseDir, caseLabel, imagePath, metadataPath } from "../io/paths";
import { CaseRecord } from "../types/caseRecord";
import { ensureDir, writeBinary, writeText } from "../utils/fs";
import { Logger, createConsoleLogger } from "../utils/log";
import { renderMetadata } from "./metadata";

export interface ImageArchiverOptions {
  fetcher: Fetcher;
  imageLimiter: RateLimiter;
  logger?: Logger;
}

export interface ArchiveFailure {
  case_number: string;
  url: string;
  message: string;
}

export interface ArchiveResult {
  attempted: number;
  downloaded: number;
  failures: ArchiveFailure[];
}

export class ImageArchiver {
  private readonly fetcher: Fetcher;
  private readonly imageLimiter: RateLimiter;
  private readonly logger: Logger;

  constructor(options: ImageArchiverOptions) {
    this.fetcher = options.fetcher;
    this.imageLimiter = options.imageLimiter;
    this.logger = options.logger ?? createConsoleLogger("archive");
  }

  async archive(records: CaseRecord[], destinationRoot: string): Promise<ArchiveResult> {
    await ensureDir(destinationRoot);

    const total = records.reduce((sum, record) => sum + record.images.length, 0);
    const failures: ArchiveFailure[] = [];
    let attempted = 0;
    let downloaded = 0;

    this.logger.info(`Starting download of ${total} images from ${records.length} cases...`);

    for (const record of records) {
      const label = caseLabel(record);
      await ensureDir(caseDir(destinationRoot, record));
      await writeText(metadataPath(destinationRoot, record), renderMetadata(record));

      for (const image of record.images) {
        attempted++;
        this.logger.info(`[${attempted}/${total}] Downloading ${label} - ${image.stage}...`);

        const response = await this.fetcher.fetchBinary(image.url);
        if (!response.ok) {
          this.logger.error(`Error downloading ${image.url}`, response.error);
          failures.push({ case_number: record.case_number, url: image.url, message: response.error.message });
          continue;
        }

        await writeBinary(imagePath(destinationRoot, record, image), response.body);
        downloaded++;
        await this.imageLimiter.afterRequest();
      }
    }

    this.logger.info(`Download complete! ${downloaded}/${attempted} images downloaded successfully.`);
    return { attempted, downloaded, failures };
  }
}
