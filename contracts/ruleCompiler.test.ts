import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { RuleCompileError } from "../shared/errors.js";
import { compileCondition, compileRule } from "./ruleCompiler.js";

function holds(condition: string, payload: Record<string, unknown>): boolean {
  return compileCondition(condition, "T-001")(payload);
}

describe("contracts/ruleCompiler", () => {
  describe("functions", () => {
    it("should measure strings, arrays and objects with len", () => {
      assert.equal(holds("len(stories) > 0", { stories: ["a"] }), true);
      assert.equal(holds("len(stories) > 0", { stories: [] }), false);
      assert.equal(holds("len(title) >= 3", { title: "abc" }), true);
      assert.equal(holds("len(meta) == 2", { meta: { a: 1, b: 2 } }), true);
    });

    it("should treat a missing field as length zero", () => {
      assert.equal(holds("len(stories) == 0", {}), true);
    });

    it("should check presence with exists", () => {
      assert.equal(holds("exists(summary)", { summary: "" }), true);
      assert.equal(holds("exists(summary)", { summary: null }), false);
      assert.equal(holds("not exists(summary)", {}), true);
    });

    it("should require a key on every array item", () => {
      const condition = 'every(stories, "acceptance")';
      assert.equal(holds(condition, { stories: [{ acceptance: "x" }, { acceptance: [] }] }), true);
      assert.equal(holds(condition, { stories: [{ acceptance: "x" }, { title: "y" }] }), false);
      assert.equal(holds(condition, { stories: ["plain"] }), false);
      assert.equal(holds(condition, { stories: "not a list" }), false);
      assert.equal(holds(condition, {}), true);
    });

    it("should search arrays and strings with contains", () => {
      assert.equal(holds('contains(labels, "security")', { labels: ["perf", "security"] }), true);
      assert.equal(holds("contains(codes, 3)", { codes: [1, 2] }), false);
      assert.equal(holds("contains(notes, 'todo')", { notes: "has a todo item" }), true);
      assert.equal(holds('contains(count, "1")', { count: 1 }), false);
    });
  });

  describe("operators", () => {
    it("should combine clauses with word and symbol forms", () => {
      const payload = { approved: true, score: 7 };
      assert.equal(holds("approved and score > 5", payload), true);
      assert.equal(holds("approved && score > 9", payload), false);
      assert.equal(holds("score > 9 || approved", payload), true);
      assert.equal(holds("!approved OR score == 7", payload), true);
    });

    it("should bind and tighter than or", () => {
      assert.equal(holds("true or false and false", {}), true);
      assert.equal(holds("(true or false) and false", {}), false);
    });

    it("should resolve dotted paths and array indexes", () => {
      const payload = { review: { verdict: "approve", comments: [{ line: 4 }] } };
      assert.equal(holds('review.verdict == "approve"', payload), true);
      assert.equal(holds("review.comments.0.line == 4", payload), true);
      assert.equal(holds("review.missing.deep == null", payload), true);
    });

    it("should not order values of different types", () => {
      assert.equal(holds('count > "3"', { count: 5 }), false);
      assert.equal(holds('name < "m"', { name: "alpha" }), true);
    });

    it("should use truthiness for bare paths", () => {
      assert.equal(holds("items", { items: [] }), false);
      assert.equal(holds("items", { items: [0] }), true);
    });
  });

  describe("compile errors", () => {
    const cases: readonly [string, RegExp][] = [
      ["len(stories)", /must evaluate to a boolean, got number/],
      ["len(a) and ok", /operand of and must be boolean/],
      ["size(a) > 1", /unknown function "size"/],
      ["every(stories)", /every\(\) takes 2 argument/],
      ["every(stories, 3)", /string key/],
      ["len(1) > 0", /must be a field path/],
      ["(a == 1", /expected "\)"/],
      ["a == 'open", /unterminated string literal/],
      ["a # b", /unexpected character "#"/],
      ["a b", /unexpected "b"/],
      ["flag > true", /cannot order boolean/],
      ["   ", /empty condition/],
    ];

    for (const [condition, reason] of cases) {
      it(`should reject ${JSON.stringify(condition)}`, () => {
        assert.throws(
          () => compileCondition(condition, "R-9"),
          (error: unknown) =>
            error instanceof RuleCompileError && error.ruleId === "R-9" && reason.test(error.message),
        );
      });
    }
  });

  describe("compileRule", () => {
    it("should carry the rule metadata next to the predicate", () => {
      const rule = compileRule({
        id: "REQ-001",
        severity: "warning",
        condition: "len(stories) > 0",
        message: "At least one story is expected",
        location: "stories",
        fix: "Add a user story",
      });

      assert.equal(rule.id, "REQ-001");
      assert.equal(rule.severity, "warning");
      assert.equal(rule.location, "stories");
      assert.equal(rule.fix, "Add a user story");
      assert.equal(rule.predicate({ stories: [{}] }), true);
    });
  });
});
