/**
 * Engine configuration tests
 */

import fs from "fs";
import os from "os";
import path from "path";
import { CONFIG_FILE_NAME, createEngineConfig, loadEngineConfig } from "../src/core/config";
import { ConfigError } from "../src/core/errors";

describe("Engine configuration", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "codegate-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const writeConfig = (content: unknown, name = CONFIG_FILE_NAME) => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, typeof content === "string" ? content : JSON.stringify(content));
    return file;
  };

  test("should provide defaults", () => {
    expect(createEngineConfig()).toEqual({
      budgetMs: 750,
      analysisSliceMs: 600,
      maxSourceBytes: 100_000,
      tempPathPrefixes: ["/tmp/"],
      executionTimeoutSeconds: 30,
      logging: { level: "info", format: "pretty" },
    });
  });

  test("should use defaults when no file or variables exist", () => {
    expect(loadEngineConfig({}, { cwd: dir })).toEqual(createEngineConfig());
  });

  test("should layer the environment over the config file", () => {
    writeConfig({ budgetMs: 500, maxSourceBytes: 2048, logging: { level: "debug" } });

    const config = loadEngineConfig({ CODEGATE_BUDGET_MS: "900", LOG_FORMAT: "json" }, { cwd: dir });

    expect(config.budgetMs).toBe(900);
    expect(config.maxSourceBytes).toBe(2048);
    expect(config.logging).toEqual({ level: "debug", format: "json" });
  });

  test("should read paths and prefixes from the environment", () => {
    const config = loadEngineConfig(
      {
        CODEGATE_STORE_PATH: "/var/cache/codegate",
        CODEGATE_AUDIT_LOG: "/var/log/codegate/audit.jsonl",
        CODEGATE_POLICY_PATH: "/etc/codegate/policy.json",
        CODEGATE_TEMP_PREFIXES: "/tmp/, /scratch/",
        LOG_LEVEL: "WARN",
        LOG_FILE_PATH: "",
      },
      { cwd: dir }
    );

    expect(config.storePath).toBe("/var/cache/codegate");
    expect(config.auditLogPath).toBe("/var/log/codegate/audit.jsonl");
    expect(config.policyPath).toBe("/etc/codegate/policy.json");
    expect(config.tempPathPrefixes).toEqual(["/tmp/", "/scratch/"]);
    expect(config.logging.level).toBe("warn");
    expect(config.logging.filePath).toBeUndefined();
  });

  test("should load an explicit config path relative to cwd", () => {
    writeConfig({ executionTimeoutSeconds: 5 }, "custom.json");
    expect(loadEngineConfig({}, { cwd: dir, configPath: "custom.json" }).executionTimeoutSeconds).toBe(5);
  });

  test("should fail when an explicit config file is missing", () => {
    expect(() => loadEngineConfig({}, { cwd: dir, configPath: "missing.json" })).toThrow(
      `Invalid configuration: config file not found: ${path.join(dir, "missing.json")}`
    );
  });

  test("should reject a file that is not an object", () => {
    const file = writeConfig([1, 2]);
    expect(() => loadEngineConfig({}, { cwd: dir })).toThrow(`Invalid configuration: ${file} must contain a JSON object`);
  });

  test("should reject malformed JSON", () => {
    const file = writeConfig("{ budgetMs: ");
    expect(() => loadEngineConfig({}, { cwd: dir })).toThrow(`Invalid configuration: cannot read ${file}`);
  });

  test("should reject values that fail validation", () => {
    expect(() => loadEngineConfig({ CODEGATE_BUDGET_MS: "soon" }, { cwd: dir })).toThrow(ConfigError);
    expect(() => loadEngineConfig({ CODEGATE_BUDGET_MS: "soon" }, { cwd: dir })).toThrow("budgetMs: ");
    expect(() => loadEngineConfig({ LOG_LEVEL: "loud" }, { cwd: dir })).toThrow("logging.level: Expected one of");
    expect(() => createEngineConfig({ tempPathPrefixes: ["tmp/"] })).toThrow(ConfigError);
  });

  test("should reject unknown keys", () => {
    writeConfig({ budget: 10 });
    expect(() => loadEngineConfig({}, { cwd: dir })).toThrow("Unrecognized key(s) in object: 'budget'");
  });
});
