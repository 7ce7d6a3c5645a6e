import * as assert from "assert";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ConfigurationError } from "../logic/errors";
import {
  DEFAULT_FLOW_CONFIG,
  loadFlowConfig,
  resolveFlowConfig,
} from "../logic/utils/FlowConfig";

suite("FlowConfig", () => {
  let dir: string;

  setup(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "flow-config-"));
  });

  teardown(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const file = path.join(dir, "flow.json");
    fs.writeFileSync(file, content);
    return file;
  }

  test("should return the defaults without overrides", () => {
    assert.deepStrictEqual(resolveFlowConfig(), DEFAULT_FLOW_CONFIG);
    assert.deepStrictEqual(loadFlowConfig(), DEFAULT_FLOW_CONFIG);
  });

  test("should merge styles per key", () => {
    const config = resolveFlowConfig({
      maxDepth: 3,
      styles: { loop: "fill:#000" },
    });

    assert.strictEqual(config.maxDepth, 3);
    assert.strictEqual(config.styles.loop, "fill:#000");
    assert.strictEqual(config.styles.start, DEFAULT_FLOW_CONFIG.styles.start);
    assert.strictEqual(DEFAULT_FLOW_CONFIG.styles.loop, "fill:#e8f5e9,stroke:#2e7d32");
  });

  test("should load overrides from a JSON file", () => {
    const file = writeConfig(
      JSON.stringify({
        entryMethod: "OnInit",
        eventHandlerSuffixes: ["_Tapped"],
        direction: "LR",
      })
    );

    const config = loadFlowConfig(file);

    assert.strictEqual(config.entryMethod, "OnInit");
    assert.deepStrictEqual(config.eventHandlerSuffixes, ["_Tapped"]);
    assert.strictEqual(config.direction, "LR");
    assert.strictEqual(config.maxEventHandlers, 10);
  });

  test("should reject unknown keys", () => {
    const file = writeConfig(JSON.stringify({ maxDepht: 4 }));
    assert.throws(
      () => loadFlowConfig(file),
      (error: unknown) =>
        error instanceof ConfigurationError &&
        error.message.startsWith(`Invalid configuration in ${file}: `)
    );
  });

  test("should reject values of the wrong type", () => {
    const file = writeConfig(JSON.stringify({ maxDepth: -1 }));
    assert.throws(
      () => loadFlowConfig(file),
      (error: unknown) =>
        error instanceof ConfigurationError && error.message.includes("maxDepth: ")
    );
  });

  test("should reject malformed JSON", () => {
    const file = writeConfig("{ maxDepth: ");
    assert.throws(
      () => loadFlowConfig(file),
      (error: unknown) =>
        error instanceof ConfigurationError &&
        error.message.startsWith(`Cannot read configuration file ${file}: `)
    );
  });

  test("should report a missing file as a configuration error", () => {
    const file = path.join(dir, "absent.json");
    assert.throws(() => loadFlowConfig(file), ConfigurationError);
  });
});
