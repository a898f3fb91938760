import assert from "node:assert/strict";
import { test } from "node:test";
import { parseCreateFeatureArgs } from "../src/commands/create-feature.js";

test("flags are picked out anywhere and the rest is description", () => {
  assert.deepEqual(parseCreateFeatureArgs(["Add", "--json", "-v", "flag", "--feature-num", "7"]), {
    help: false,
    json: true,
    featureNumber: 7,
    words: ["Add", "-v", "flag"],
  });
});

test("the inline --feature-num form is accepted", () => {
  assert.deepEqual(parseCreateFeatureArgs(["--feature-num=012", "inline"]), {
    help: false,
    json: false,
    featureNumber: 12,
    words: ["inline"],
  });
});

test("help wins once reached", () => {
  assert.deepEqual(parseCreateFeatureArgs(["some", "-h", "--feature-num"]), { help: true });
  assert.deepEqual(parseCreateFeatureArgs(["--help"]), { help: true });
});

test("--feature-num is checked before later help flags", () => {
  assert.throws(() => parseCreateFeatureArgs(["--feature-num", "abc", "--help"]), {
    name: "UsageError",
    message: "--feature-num must be a positive integer",
  });
});

test("a missing or dash-led --feature-num value is rejected", () => {
  for (const tokens of [["x", "--feature-num"], ["--feature-num", "-5", "x"]]) {
    assert.throws(() => parseCreateFeatureArgs(tokens), {
      name: "UsageError",
      message: "--feature-num requires a number (1-999)",
    });
  }
});

test("no tokens means no description", () => {
  assert.deepEqual(parseCreateFeatureArgs([]), { help: false, json: false, featureNumber: undefined, words: [] });
});
