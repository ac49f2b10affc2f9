import { describe, expect, it } from "vitest";
import { configFromEnv, loadPipelineConfig } from "../src/core/config.js";
import { ConfigurationError } from "../src/core/errors.js";

describe("loadPipelineConfig", () => {
  it("applies defaults when the environment is empty", () => {
    const config = loadPipelineConfig({});
    expect(config).toMatchObject({
      registryPath: "config/schema-registry.csv",
      outputDir: "output",
      outputFormat: "both",
      strictness: "collect",
      concurrency: 8,
      frameworkFilter: [],
      failOnIntegrityError: true,
      domainIdLength: 3,
      ignoreSheets: ["Lists"],
      headerRows: { "Threat Catalog": 6, "Risk Catalog": 6 },
      sheetAliases: {},
      logLevel: "info",
      logFormat: "pretty"
    });
    expect(config.maxIntegrityWarnings).toBeUndefined();
  });

  it("parses environment values", () => {
    const config = loadPipelineConfig({
      CONTROL_DOCS_CONCURRENCY: "4",
      CONTROL_DOCS_FRAMEWORKS: "nist_800_53_rev5, scf_to_iso_27001,",
      CONTROL_DOCS_FAIL_ON_INTEGRITY_ERROR: "false",
      CONTROL_DOCS_MAX_INTEGRITY_WARNINGS: "25",
      CONTROL_DOCS_HEADER_ROWS: "Threat Catalog=3, Controls=2",
      CONTROL_DOCS_SHEET_ALIASES: "My Threats=threat",
      CONTROL_DOCS_OUTPUT_FORMAT: "json"
    });
    expect(config.concurrency).toBe(4);
    expect(config.frameworkFilter).toEqual(["nist_800_53_rev5", "scf_to_iso_27001"]);
    expect(config.failOnIntegrityError).toBe(false);
    expect(config.maxIntegrityWarnings).toBe(25);
    expect(config.headerRows).toEqual({ "Threat Catalog": 3, Controls: 2 });
    expect(config.sheetAliases).toEqual({ "My Threats": "threat" });
    expect(config.outputFormat).toBe("json");
  });

  it("lets explicit overrides win over the environment", () => {
    const config = loadPipelineConfig(
      { CONTROL_DOCS_OUTPUT_DIR: "from-env", CONTROL_DOCS_STRICTNESS: "fail_fast" },
      { outputDir: "from-override", strictness: undefined }
    );
    expect(config.outputDir).toBe("from-override");
    expect(config.strictness).toBe("fail_fast");
  });

  it("names the environment variable of an invalid value", () => {
    let caught: unknown;
    try {
      loadPipelineConfig({ CONTROL_DOCS_OUTPUT_FORMAT: "yaml", CONTROL_DOCS_CONCURRENCY: "0" });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    const details = caught instanceof ConfigurationError ? caught.details : [];
    expect(details).toHaveLength(2);
    expect(details[0]).toMatch(/^CONTROL_DOCS_OUTPUT_FORMAT: /);
    expect(details[1]).toMatch(/^CONTROL_DOCS_CONCURRENCY: /);
  });

  it("rejects an unrecognized boolean flag", () => {
    expect(() => loadPipelineConfig({ CONTROL_DOCS_FAIL_ON_INTEGRITY_ERROR: "sometimes" })).toThrow(
      ConfigurationError
    );
  });
});

describe("configFromEnv", () => {
  it("ignores blank and unrelated variables", () => {
    expect(configFromEnv({ CONTROL_DOCS_OUTPUT_DIR: "  ", CONTROL_DOCS_LOG_LEVEL: " debug ", HOME: "/tmp" })).toEqual({
      logLevel: "debug"
    });
  });
});
