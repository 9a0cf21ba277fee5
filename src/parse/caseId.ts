import path from "path";

const CASE_ID_PATTERN = /^([A-Z]+)\d+\.[A-Za-z0-9]+$/;

export function deriveCaseId(imageSrc: string | null | undefined): string | null {
  if (!imageSrc) return null;
  const filename = path.posix.basename(imageSrc.split(/[?#]/)[0]);
  const match = CASE_ID_PATTERN.exec(filename);
  return match ? match[1] : null;
}
