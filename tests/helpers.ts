import { vi } from "vitest";
import { readFileSync } from "fs";
import path from "path";
import { FetchError, FetchResult, Fetcher } from "../src/http/client";
import { Clock } from "../src/http/rateLimiter";
import { Logger } from "../src/utils/log";

export const BASE_URL = "https://screening.iarc.fr";
export const fixturesDir = path.join(process.cwd(), "fixtures");

export function readFixture(name: string): string {
  return readFileSync(path.join(fixturesDir, name), "utf8");
}

export interface FakeFetcher extends Fetcher {
  requested: string[];
}

function notFound<T>(url: string): FetchResult<T> {
  return { ok: false, error: new FetchError(url, "http", 404, "Not Found") };
}

export function fakeFetcher(pages: Record<string, string>): FakeFetcher {
  const requested: string[] = [];
  return {
    requested,
    async fetchText(url) {
      requested.push(url);
      const body = pages[url];
      if (body === undefined) return notFound(url);
      return { ok: true, url, status: 200, body };
    },
    async fetchBinary(url) {
      requested.push(url);
      const body = pages[url];
      if (body === undefined) return notFound(url);
      return { ok: true, url, status: 200, body: Buffer.from(body, "utf8") };
    }
  };
}

export interface RecordingClock extends Clock {
  sleeps: number[];
}

export function recordingClock(): RecordingClock {
  const sleeps: number[] = [];
  return {
    sleeps,
    async sleep(ms) {
      sleeps.push(ms);
    }
  };
}

export function captureLogger() {
  return {
    info: vi.fn<[string], void>(),
    warn: vi.fn<[string], void>(),
    error: vi.fn<[string, unknown?], void>()
  } satisfies Logger;
}
