import { describe, it, expect } from "vitest";
import {
  DEFAULT_API_BASE_URL,
  DEFAULT_PATH_TRANSFORMER,
  parseOperatorOptions,
  resolveApiBaseUrl,
} from "../src/shared/config.js";
import { parseLogLevel } from "../src/shared/logger.js";

describe("resolveApiBaseUrl", () => {
  it("defaults to the in-cluster API", () => {
    expect(resolveApiBaseUrl()).toBe(DEFAULT_API_BASE_URL);
  });

  it("option takes priority over env var", () => {
    expect(resolveApiBaseUrl("http://a.test/api", "http://b.test/api")).toBe("http://a.test/api");
  });

  it("falls back to env var and strips trailing slashes", () => {
    expect(resolveApiBaseUrl(undefined, "http://b.test/api//")).toBe("http://b.test/api");
  });
});

describe("parseOperatorOptions", () => {
  it("fills defaults", () => {
    expect(parseOperatorOptions({}, {})).toEqual({
      pathTransformer: DEFAULT_PATH_TRANSFORMER,
      ignoreSdpc: false,
      apiBaseUrl: DEFAULT_API_BASE_URL,
      batchSize: 1000,
      requestTimeoutMs: undefined,
    });
  });

  it("reads the API root from DATASET_API_BASE_URL", () => {
    const cfg = parseOperatorOptions({}, { DATASET_API_BASE_URL: "http://env.test/dm/" });
    expect(cfg.apiBaseUrl).toBe("http://env.test/dm");
  });

  it("rejects invalid values", () => {
    expect(() => parseOperatorOptions({ batchSize: 0 }, {})).toThrow();
    expect(() => parseOperatorOptions({ apiBaseUrl: "not a url" }, {})).toThrow();
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels case-insensitively and defaults to info", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel("warning")).toBe("warn");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel()).toBe("info");
  });
});
