import * as cheerio from "cheerio";
import { CaseStub } from "../types/caseRecord";
import { textFromElement } from "../dom/traverse";
import { resolveHref } from "../utils/url";
import { deriveCaseId } from "./caseId";

export const CONTENT_SELECTOR = "div.col-sm-11";
export const RESULTS_TABLE_SELECTOR = "table.table.table-striped.table-hover";
const MIN_COLUMNS = 5;

export interface ListPageResult {
  tableFound: boolean;
  stubs: CaseStub[];
}

export function parseListPage(html: string, baseUrl: string): ListPageResult {
  const $ = cheerio.load(html);
  const table = $(CONTENT_SELECTOR).first().find(RESULTS_TABLE_SELECTOR).first();
  if (!table.length) {
    return { tableFound: false, stubs: [] };
  }

  const stubs: CaseStub[] = [];
  for (const row of table.find("tr").toArray().slice(1)) {
    const cols = $(row).find("td");
    if (cols.length < MIN_COLUMNS) continue;

    const diagnosisCol = cols.eq(4);
    const diagnosisFont = diagnosisCol.find("font").first();
    const thumbnailCol = cols.eq(1);

    stubs.push({
      case_number: textFromElement(cols.eq(0)),
      case_id: deriveCaseId(thumbnailCol.find("img").first().attr("src")),
      histopathology_diagnosis: textFromElement(diagnosisFont.length ? diagnosisFont : diagnosisCol),
      detail_link: resolveHref(thumbnailCol.find("a").first().attr("href"), baseUrl)
    });
  }

  return { tableFound: true, stubs };
}
