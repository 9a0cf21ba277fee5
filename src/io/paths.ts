import path from "path";
import { CaseRecord, ImageDescriptor } from "../types/caseRecord";
import { sanitizePathSegment } from "../utils/text";
import { urlExtension } from "../utils/url";

export const METADATA_FILE_NAME = "metadata.txt";
export const DEFAULT_IMAGE_EXTENSION = ".jpg";

export function caseLabel(record: CaseRecord): string {
  return record.case_id ?? record.case_number;
}

export function caseDir(root: string, record: CaseRecord): string {
  return path.join(root, `case_${sanitizePathSegment(caseLabel(record))}`);
}

export function metadataPath(root: string, record: CaseRecord): string {
  return path.join(caseDir(root, record), METADATA_FILE_NAME);
}

export function imageFileName(image: ImageDescriptor): string {
  const extension = urlExtension(image.url) ?? DEFAULT_IMAGE_EXTENSION;
  return `${image.order}_${sanitizePathSegment(image.stage)}${extension}`;
}

export function imagePath(root: string, record: CaseRecord, image: ImageDescriptor): string {
  return path.join(caseDir(root, record), imageFileName(image));
}
