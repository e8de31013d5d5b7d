import { ConfigError, loadMetricsConfig, loadOutputConfig } from "../src/config.js";

describe("loadMetricsConfig", () => {
  it("applies defaults", () => {
    expect(loadMetricsConfig({ GITHUB_REPOSITORY: "acme/widgets" })).toEqual({
      token: "",
      repository: "acme/widgets",
      windowDays: 30,
      outputDir: "site",
    });
  });

  it("reads the window and token", () => {
    const config = loadMetricsConfig({
      GITHUB_TOKEN: "test-token",
      GITHUB_REPOSITORY: "acme/widgets",
      METRICS_WINDOW_DAYS: "7",
    });
    expect(config.token).toBe("test-token");
    expect(config.windowDays).toBe(7);
  });

  it("requires an owner/name repository", () => {
    expect(() => loadMetricsConfig({})).toThrow(ConfigError);
    expect(() => loadMetricsConfig({ GITHUB_REPOSITORY: "widgets" })).toThrow(ConfigError);
  });

  it("rejects a non-positive window", () => {
    expect(() => loadMetricsConfig({ GITHUB_REPOSITORY: "acme/widgets", METRICS_WINDOW_DAYS: "0" })).toThrow(
      /METRICS_WINDOW_DAYS/,
    );
  });
});

describe("loadOutputConfig", () => {
  it("defaults to site without any GitHub settings", () => {
    expect(loadOutputConfig({})).toEqual({ outputDir: "site" });
  });

  it("reads the same directory the collector uses", () => {
    const env = { GITHUB_REPOSITORY: "acme/widgets", METRICS_OUTPUT_DIR: "public/metrics" };
    expect(loadOutputConfig(env).outputDir).toBe(loadMetricsConfig(env).outputDir);
    expect(loadOutputConfig(env)).toEqual({ outputDir: "public/metrics" });
  });

  it("rejects an empty directory like the collector does", () => {
    expect(() => loadOutputConfig({ METRICS_OUTPUT_DIR: "" })).toThrow(ConfigError);
    expect(() => loadMetricsConfig({ GITHUB_REPOSITORY: "acme/widgets", METRICS_OUTPUT_DIR: "" })).toThrow(
      /METRICS_OUTPUT_DIR/,
    );
  });
});
