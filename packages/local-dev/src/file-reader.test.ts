import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { FileObjectReader } from "./file-reader.js";

describe("FileObjectReader", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "carelog-reader-"));
    await writeFile(join(dir, "batch-1.json"), '[{"note":"Ate well"}]', "utf-8");
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a file relative to the bucket directory", async () => {
    const result = await new FileObjectReader().getObjectText(dir, "batch-1.json");

    expect(result).toEqual({ ok: true, value: '[{"note":"Ate well"}]' });
  });

  it("reports a missing file as not-found", async () => {
    const result = await new FileObjectReader().getObjectText(dir, "missing.json");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe("not-found");
    expect(result.error.key).toBe("missing.json");
  });

  it("reports other read errors as unknown", async () => {
    // Reading a directory fails with EISDIR
    const result = await new FileObjectReader().getObjectText(dir, ".");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe("unknown");
  });
});
