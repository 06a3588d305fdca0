import { describe, expect, it } from "vitest";
import { configSchema, stitchConfigSchema } from "./schema.js";

describe("configSchema", () => {
  it("parses empty object with defaults", () => {
    const result = configSchema.parse({});
    expect(result).toEqual({
      workDir: "temp_files",
      outputDir: "output_video",
      outputName: "combined_video.mp4",
      retries: 3,
      backoffMs: 2000,
      timeoutMs: 10000,
      maxConsecutiveFailures: 5,
      keepSegments: false,
    });
  });

  it("accepts valid config values", () => {
    const input = {
      workDir: "/tmp/segments",
      outputDir: "~/Videos",
      outputName: "lecture.mkv",
      retries: 5,
      backoffMs: 500,
      timeoutMs: 30000,
      maxConsecutiveFailures: 10,
      keepSegments: true,
    };
    expect(configSchema.parse(input)).toEqual(input);
  });

  it("rejects retries outside valid range", () => {
    expect(() => configSchema.parse({ retries: 0 })).toThrow();
    expect(() => configSchema.parse({ retries: 11 })).toThrow();
  });

  it("rejects negative backoff", () => {
    expect(() => configSchema.parse({ backoffMs: -1 })).toThrow();
  });

  it("rejects a zero failure threshold", () => {
    expect(() => configSchema.parse({ maxConsecutiveFailures: 0 })).toThrow();
  });

  it("rejects non-integer numbers", () => {
    expect(() => configSchema.parse({ timeoutMs: 1500.5 })).toThrow();
  });
});

describe("stitchConfigSchema", () => {
  const valid = {
    baseUrl: "https://cdn.example.com/v/clip-000000.ts?token=abc",
    outputPath: "/videos/out.mp4",
    workDir: "/tmp/work",
    retries: 3,
    backoffMs: 2000,
    timeoutMs: 10000,
    maxConsecutiveFailures: 5,
    keepSegments: false,
  };

  it("accepts a complete run config", () => {
    expect(stitchConfigSchema.parse(valid)).toEqual(valid);
  });

  it("rejects URLs without the segment marker", () => {
    const result = stitchConfigSchema.safeParse({
      ...valid,
      baseUrl: "https://cdn.example.com/v/clip-000001.ts",
    });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe(
      'URL must contain the segment marker "-000000.ts"'
    );
  });

  it("rejects strings that are not URLs", () => {
    expect(stitchConfigSchema.safeParse({ ...valid, baseUrl: "clip-000000.ts" }).success).toBe(
      false
    );
  });

  it("requires every field", () => {
    expect(stitchConfigSchema.safeParse({ baseUrl: valid.baseUrl }).success).toBe(false);
  });
});
