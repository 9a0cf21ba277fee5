import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { ImageArchiver } from "../src/archive/imageArchiver";
import { renderMetadata } from "../src/archive/metadata";
import { RateLimiter } from "../src/http/rateLimiter";
import { CaseRecord } from "../src/types/caseRecord";
import { captureLogger, fakeFetcher, recordingClock } from "./helpers";

const withImages: CaseRecord = {
  case_number: "12",
  case_id: "AABB",
  histopathology_diagnosis: "CIN 3",
  detail_link: "https://example.test/detail?Index=12",
  age: "35",
  hpv_status: "Positive",
  provisional_diagnosis: "High-grade lesion",
  management: "Excision by LEEP",
  swede_score: "7",
  images: [
    { url: "https://example.test/img/AABB1.jpg", stage: "After normal saline", description: "", order: 1 },
    { url: "https://example.test/img/missing.jpg", stage: "After acetic acid", description: "", order: 2 },
    { url: "https://example.test/img/AABB3", stage: "Green/filter", description: "", order: 3 }
  ]
};

const withoutId: CaseRecord = {
  case_number: "14",
  case_id: null,
  histopathology_diagnosis: "Squamous carcinoma",
  detail_link: null,
  age: null,
  hpv_status: null,
  provisional_diagnosis: null,
  management: null,
  swede_score: null,
  images: []
};

describe("metadata summary", () => {
  it("lists scalar fields and the image manifest", () => {
    expect(renderMetadata(withImages)).toBe(
      [
        "Case Number: 12",
        "Case ID: AABB",
        "Age: 35",
        "HPV Status: Positive",
        "Provisional Diagnosis: High-grade lesion",
        "Histopathology Diagnosis: CIN 3",
        "Management: Excision by LEEP",
        "Swede Score: 7",
        "Detail Link: https://example.test/detail?Index=12",
        "",
        "Images:",
        "  1. After normal saline: https://example.test/img/AABB1.jpg",
        "  2. After acetic acid: https://example.test/img/missing.jpg",
        "  3. Green/filter: https://example.test/img/AABB3",
        ""
      ].join("\n")
    );
  });

  it("renders absent fields as empty values", () => {
    const lines = renderMetadata(withoutId).split("\n");
    expect(lines.slice(0, 3)).toEqual(["Case Number: 14", "Case ID: ", "Age: "]);
    expect(lines.slice(-3)).toEqual(["", "Images:", ""]);
  });
});

describe("image archiver", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(tmpdir(), "colpo-archive-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("downloads what it can, skips failures and reports counts", async () => {
    const fetcher = fakeFetcher({
      "https://example.test/img/AABB1.jpg": "first-image",
      "https://example.test/img/AABB3": "third-image"
    });
    const clock = recordingClock();
    const logger = captureLogger();
    const archiver = new ImageArchiver({ fetcher, imageLimiter: new RateLimiter(500, clock), logger });
    const root = path.join(tmpDir, "images");

    const result = await archiver.archive([withImages, withoutId], root);

    expect(result.attempted).toBe(3);
    expect(result.downloaded).toBe(2);
    expect(result.failures).toEqual([
      {
        case_number: "12",
        url: "https://example.test/img/missing.jpg",
        message: "GET https://example.test/img/missing.jpg failed (404): Not Found"
      }
    ]);
    expect(clock.sleeps).toEqual([500, 500]);

    const caseDir = path.join(root, "case_AABB");
    expect((await readdir(caseDir)).sort()).toEqual(["1_After_normal_saline.jpg", "3_Green_filter.jpg", "metadata.txt"]);
    expect(await readFile(path.join(caseDir, "1_After_normal_saline.jpg"), "utf8")).toBe("first-image");

    const metadata = await readFile(path.join(caseDir, "metadata.txt"), "utf8");
    expect(metadata).toContain("  2. After acetic acid: https://example.test/img/missing.jpg\n");

    expect(await readdir(path.join(root, "case_14"))).toEqual(["metadata.txt"]);
    expect(logger.info).toHaveBeenLastCalledWith("Download complete! 2/3 images downloaded successfully.");
  });

  it("can be rerun over an existing archive", async () => {
    const fetcher = fakeFetcher({});
    const archiver = new ImageArchiver({
      fetcher,
      imageLimiter: new RateLimiter(0, recordingClock()),
      logger: captureLogger()
    });
    const root = path.join(tmpDir, "images");

    await archiver.archive([withoutId], root);
    const second = await archiver.archive([withoutId], root);

    expect(second).toEqual({ attempted: 0, downloaded: 0, failures: [] });
    expect(await readdir(root)).toEqual(["case_14"]);
  });
});
