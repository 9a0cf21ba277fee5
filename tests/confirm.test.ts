import { describe, expect, it } from "vitest";
import { PassThrough } from "stream";
import { askYesNo, isAffirmative } from "../src/cli/confirm";

describe("yes/no prompt", () => {
  it("accepts only y as a yes", () => {
    expect(isAffirmative("y")).toBe(true);
    expect(isAffirmative(" Y ")).toBe(true);
    expect(isAffirmative("yes")).toBe(false);
    expect(isAffirmative("n")).toBe(false);
    expect(isAffirmative("")).toBe(false);
  });

  it("reads the answer from the input stream", async () => {
    const input = new PassThrough();
    const output = new PassThrough();

    const answer = askYesNo("Download? ", { input, output });
    input.write("y\n");

    await expect(answer).resolves.toBe(true);
  });

  it("treats a closed input as no", async () => {
    const input = new PassThrough();
    const output = new PassThrough();

    const answer = askYesNo("Download? ", { input, output });
    input.end();

    await expect(answer).resolves.toBe(false);
  });
});
