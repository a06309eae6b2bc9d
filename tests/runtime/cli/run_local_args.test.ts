/** Intent: run:local argument parsing and interrupt choice aliases. */
import test from "node:test";
import assert from "node:assert/strict";
import {
  DEFAULT_SESSION_NAME,
  parseChoiceInput,
  parseRunLocalArgs,
} from "../../../runtime/cli/run_local.args";

test("no arguments yields the default session", () => {
  assert.deepEqual(parseRunLocalArgs([]), { session: DEFAULT_SESSION_NAME, freshSession: false });
});

test("flags and positional input are parsed", () => {
  assert.deepEqual(
    parseRunLocalArgs([
      "--session",
      "kitchen",
      "--user",
      "u-1",
      "--budget",
      "10000",
      "--servings",
      "2",
      "--provider",
      "ollama",
      "--fresh",
      "스테이크",
      "레시피",
    ]),
    {
      session: "kitchen",
      user: "u-1",
      budget: 10000,
      servings: 2,
      provider: "ollama",
      freshSession: true,
      initialInput: "스테이크 레시피",
    }
  );
});

test("missing or non-numeric values are rejected", () => {
  assert.throws(() => parseRunLocalArgs(["--session"]), /--session requires a value/);
  assert.throws(() => parseRunLocalArgs(["--model", "--fresh"]), /--model requires a value/);
  assert.throws(() => parseRunLocalArgs(["--budget", "many"]), /--budget requires a numeric value/);
});

test("choice aliases map to budget choices", () => {
  assert.equal(parseChoiceInput(" C "), "CONTINUE");
  assert.equal(parseChoiceInput("substitute"), "SUBSTITUTE");
  assert.equal(parseChoiceInput("취소"), "CANCEL");
  assert.equal(parseChoiceInput("maybe"), null);
  assert.equal(parseChoiceInput("toString"), null);
});
