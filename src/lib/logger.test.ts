import assert from "assert/strict";
import { isDebugEnabled } from "./logger.js";

suite("logger", () => {
  test("debug output follows DEBUG or GIT_PUBLISH_DEBUG", () => {
    assert.strictEqual(isDebugEnabled({}), false);
    assert.strictEqual(isDebugEnabled({ DEBUG: "true" }), true);
    assert.strictEqual(isDebugEnabled({ GIT_PUBLISH_DEBUG: "true" }), true);
    assert.strictEqual(isDebugEnabled({ DEBUG: "1" }), false);
  });
});
