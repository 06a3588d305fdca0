import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { formatManifestLine, MANIFEST_FILENAME, writeConcatManifest } from "./manifest.js";

describe("formatManifestLine", () => {
  it("uses only the base name", () => {
    expect(formatManifestLine("/tmp/work/000123.ts")).toBe("file '000123.ts'");
  });

  it("keeps bare names as they are", () => {
    expect(formatManifestLine("000000.ts")).toBe("file '000000.ts'");
  });
});

describe("writeConcatManifest", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "segstitch-manifest-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes one line per file in order", async () => {
    const files = ["000000.ts", "000001.ts", "000003.ts"].map((name) => join(dir, name));

    const manifestPath = await writeConcatManifest(files, dir);

    expect(manifestPath).toBe(join(dir, MANIFEST_FILENAME));
    expect(readFileSync(manifestPath, "utf-8")).toBe(
      "file '000000.ts'\nfile '000001.ts'\nfile '000003.ts'\n"
    );
  });

  it("creates a missing working directory", async () => {
    const nested = join(dir, "nested");

    const manifestPath = await writeConcatManifest([join(nested, "000000.ts")], nested);

    expect(readFileSync(manifestPath, "utf-8")).toBe("file '000000.ts'\n");
  });

  it("propagates errors when the directory cannot be created", async () => {
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "");

    await expect(writeConcatManifest(["000000.ts"], join(blocker, "work"))).rejects.toThrow();
  });
});
