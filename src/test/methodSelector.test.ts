import * as assert from "assert";
import { isEventHandlerName, selectRoots } from "../logic/MethodSelector";
import { DEFAULT_FLOW_CONFIG } from "../logic/utils/FlowConfig";
import { classOf, method } from "./helpers/statements";

function names(methods: { name: string }[]): string[] {
  return methods.map((m) => m.name);
}

suite("MethodSelector", () => {
  const page = classOf(
    "OrderPage",
    method("LoadOrders", []),
    method("Save_Click", []),
    method("Page_Load", []),
    method("Filter_Changed", []),
    method("Region_SelectedIndexChanged", []),
    method("Express_CheckedChanged", []),
    method("Clicker", [])
  );

  test("should put the entry method first, then handlers in declaration order", () => {
    assert.deepStrictEqual(names(selectRoots(page, DEFAULT_FLOW_CONFIG)), [
      "Page_Load",
      "Save_Click",
      "Filter_Changed",
      "Region_SelectedIndexChanged",
      "Express_CheckedChanged",
    ]);
  });

  test("should return only the explicit target", () => {
    assert.deepStrictEqual(
      names(selectRoots(page, DEFAULT_FLOW_CONFIG, "LoadOrders")),
      ["LoadOrders"]
    );
  });

  test("should return nothing for an unknown target", () => {
    assert.deepStrictEqual(selectRoots(page, DEFAULT_FLOW_CONFIG, "Missing"), []);
  });

  test("should match the target name exactly", () => {
    assert.deepStrictEqual(selectRoots(page, DEFAULT_FLOW_CONFIG, "page_load"), []);
  });

  test("should cap event handlers at ten", () => {
    const handlers = Array.from({ length: 15 }, (_, i) =>
      method(`Button${i}_Click`, [])
    );
    const roots = selectRoots(classOf("Busy", ...handlers), DEFAULT_FLOW_CONFIG);
    assert.deepStrictEqual(
      names(roots),
      handlers.slice(0, 10).map((h) => h.name)
    );
  });

  test("should work without an entry method", () => {
    const roots = selectRoots(
      classOf("Panel", method("Helper", []), method("Ok_Click", [])),
      DEFAULT_FLOW_CONFIG
    );
    assert.deepStrictEqual(names(roots), ["Ok_Click"]);
  });

  test("should recognise handler suffixes", () => {
    const suffixes = DEFAULT_FLOW_CONFIG.eventHandlerSuffixes;
    assert.strictEqual(isEventHandlerName("Grid_SelectedIndexChanged", suffixes), true);
    assert.strictEqual(isEventHandlerName("Click", suffixes), false);
    assert.strictEqual(isEventHandlerName("OnClick", suffixes), false);
  });
});
