import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config";

describe("loadConfig", () => {
  it("defaults to info without pretty printing", () => {
    expect(loadConfig({})).toEqual({ logLevel: "info", logPretty: false });
  });

  it("reads LOG_LEVEL and LOG_PRETTY", () => {
    expect(loadConfig({ LOG_LEVEL: "silent", LOG_PRETTY: "true" })).toEqual({
      logLevel: "silent",
      logPretty: true,
    });
  });

  it("throws on unknown values", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow();
    expect(() => loadConfig({ LOG_PRETTY: "yes" })).toThrow();
  });
});
