import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { containsExitKeyword } from "../../shared/utils/exit-keywords";

describe("containsExitKeyword", () => {
  it("fires on whole-word keywords in any case", () => {
    assert.equal(containsExitKeyword("I quit"), true);
    assert.equal(containsExitKeyword("bye"), true);
    assert.equal(containsExitKeyword("OK, Goodbye!"), true);
    assert.equal(containsExitKeyword("please STOP."), true);
  });

  it("ignores keywords embedded in other words", () => {
    assert.equal(containsExitKeyword("ending the call"), false);
    assert.equal(containsExitKeyword("thanks"), false);
    assert.equal(containsExitKeyword("I built a backend service"), false);
    assert.equal(containsExitKeyword("nonstop delivery"), false);
  });

  it("handles empty input", () => {
    assert.equal(containsExitKeyword(""), false);
  });
});
