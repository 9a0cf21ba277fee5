import { stringify } from "csv-stringify/sync";
import { CaseRecord } from "../types/caseRecord";
import { writeText } from "../utils/fs";
import { Logger, createConsoleLogger } from "../utils/log";

export const CSV_COLUMNS = [
  "case_number",
  "case_id",
  "age",
  "hpv_status",
  "provisional_diagnosis",
  "histopathology_diagnosis",
  "management",
  "swede_score",
  "num_images",
  "detail_link"
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];
export type CsvRow = Record<CsvColumn, string | number>;

export interface ExportResult {
  written: boolean;
  rows: number;
  path: string;
}

export function toCsvRow(record: CaseRecord): CsvRow {
  return {
    case_number: record.case_number,
    case_id: record.case_id ?? "",
    age: record.age ?? "",
    hpv_status: record.hpv_status ?? "",
    provisional_diagnosis: record.provisional_diagnosis ?? "",
    histopathology_diagnosis: record.histopathology_diagnosis,
    management: record.management ?? "",
    swede_score: record.swede_score ?? "",
    num_images: record.images.length,
    detail_link: record.detail_link ?? ""
  };
}

export function renderCsv(records: CaseRecord[]): string {
  return stringify(records.map(toCsvRow), {
    header: true,
    columns: [...CSV_COLUMNS]
  });
}

export async function exportCasesToCsv(
  records: CaseRecord[],
  destination: string,
  logger: Logger = createConsoleLogger("export")
): Promise<ExportResult> {
  if (!records.length) {
    logger.info("No cases to save");
    return { written: false, rows: 0, path: destination };
  }

  await writeText(destination, renderCsv(records));
  logger.info(`Data saved to ${destination}`);
  return { written: true, rows: records.length, path: destination };
}
