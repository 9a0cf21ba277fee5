import { CaseRecord } from "../types/caseRecord";

export function renderMetadata(record: CaseRecord): string {
  const lines = [
    `Case Number: ${record.case_number}`,
    `Case ID: ${record.case_id ?? ""}`,
    `Age: ${record.age ?? ""}`,
    `HPV Status: ${record.hpv_status ?? ""}`,
    `Provisional Diagnosis: ${record.provisional_diagnosis ?? ""}`,
    `Histopathology Diagnosis: ${record.histopathology_diagnosis}`,
    `Management: ${record.management ?? ""}`,
    `Swede Score: ${record.swede_score ?? ""}`,
    `Detail Link: ${record.detail_link ?? ""}`,
    "",
    "Images:",
    ...record.images.map((image) => `  ${image.order}. ${image.stage}: ${image.url}`)
  ];
  return lines.join("\n") + "\n";
}
