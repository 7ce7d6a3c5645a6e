import * as assert from "assert";
import { LabelSanitizer } from "../logic/utils/LabelSanitizer";

suite("LabelSanitizer", () => {
  test("should replace double quotes with single quotes", () => {
    assert.strictEqual(
      LabelSanitizer.sanitize('Response.Write("done")'),
      "Response.Write#40;'done'#41;"
    );
  });

  test("should fold line breaks and repeated spaces into one space", () => {
    assert.strictEqual(LabelSanitizer.sanitize("a &&\r\n    b\nc"), "a && b c");
    assert.strictEqual(LabelSanitizer.sanitize("x    =  1"), "x = 1");
  });

  test("should escape characters that delimit mermaid shapes", () => {
    assert.strictEqual(
      LabelSanitizer.sanitize("a[0] < f(x)"),
      "a#91;0#93; #60; f#40;x#41;"
    );
    assert.strictEqual(LabelSanitizer.sanitize("{y}"), "#123;y#125;");
    assert.strictEqual(LabelSanitizer.sanitize("a > b"), "a #62; b");
  });

  test("should escape pipes that would end an edge label", () => {
    assert.strictEqual(
      LabelSanitizer.sanitize("Flags.A | Flags.B"),
      "Flags.A #124; Flags.B"
    );
    assert.strictEqual(LabelSanitizer.sanitize("a || b"), "a #124;#124; b");
  });

  test("should truncate labels over the limit with an ellipsis", () => {
    const result = LabelSanitizer.sanitize("x".repeat(50));
    assert.strictEqual(result, "x".repeat(37) + "...");
    assert.strictEqual(result.length, 40);
  });

  test("should keep labels exactly at the limit", () => {
    assert.strictEqual(LabelSanitizer.sanitize("y".repeat(40)), "y".repeat(40));
  });

  test("should allow 60 characters for conditions", () => {
    assert.strictEqual(
      LabelSanitizer.sanitizeCondition("c".repeat(60)),
      "c".repeat(60)
    );
    assert.strictEqual(
      LabelSanitizer.sanitizeCondition("c".repeat(61)),
      "c".repeat(57) + "..."
    );
  });

  test("should honour an explicit maximum length", () => {
    assert.strictEqual(LabelSanitizer.sanitize("abcdefghij", 8), "abcde...");
  });

  test("should return an empty string for missing input", () => {
    assert.strictEqual(LabelSanitizer.sanitize(""), "");
    assert.strictEqual(LabelSanitizer.sanitize(null), "");
    assert.strictEqual(LabelSanitizer.sanitize(undefined), "");
  });

  test("should trim surrounding whitespace", () => {
    assert.strictEqual(LabelSanitizer.sanitize("  total = 0 \n"), "total = 0");
  });

  test("should be stable when applied twice", () => {
    const inputs = [
      'if (items.Count > 0 && name != "")',
      "Dictionary<string, List<int>> map = new Dictionary<string, List<int>>()",
      "a\n\n  b",
      "z".repeat(90),
    ];
    for (const input of inputs) {
      const once = LabelSanitizer.sanitize(input);
      assert.strictEqual(LabelSanitizer.sanitize(once), once);
      const condition = LabelSanitizer.sanitizeCondition(input);
      assert.strictEqual(LabelSanitizer.sanitizeCondition(condition), condition);
    }
  });
});
