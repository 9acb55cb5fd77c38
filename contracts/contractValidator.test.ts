import { describe, it } from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { SchemaNotFoundError } from "../shared/errors.js";
import { ContractValidator, hasBlockingViolations } from "./contractValidator.js";
import { validateSchemaDocument } from "./schemaDocument.js";

const SCHEMAS_DIR = path.resolve("contracts", "schemas");

function versionedValidator(): ContractValidator {
  const v1 = validateSchemaDocument(
    {
      name: "deploy",
      version: "1.0",
      output: { fields: { target: { type: "string", required: true } } },
    },
    "deploy-1.0.yaml",
  );
  const v1_2 = validateSchemaDocument(
    {
      name: "deploy",
      version: "1.2",
      output: {
        fields: {
          target: { type: "string", required: true },
          region: { type: "string", required: true, since: "1.2" },
        },
      },
    },
    "deploy-1.2.yaml",
  );
  return ContractValidator.fromSchemas([v1, v1_2]);
}

describe("ContractValidator", () => {
  const validator = ContractValidator.fromDirectory(SCHEMAS_DIR);

  it("should load the seven workflow contracts", () => {
    assert.deepEqual(
      validator.listContracts().map((contract) => contract.name),
      [
        "architecture",
        "build_test",
        "final_approval",
        "implementation",
        "integration",
        "requirements",
        "review",
      ],
    );
  });

  it("should return no violations for a valid payload", () => {
    const violations = validator.validateOutput("requirements", {
      requirements: [{ id: "R1", description: "Export reports as CSV" }],
      acceptance_criteria: ["A CSV file is downloaded"],
    });

    assert.deepEqual(violations, []);
  });

  it("should report a missing required field by name", () => {
    const violations = validator.validateInput("architecture", { request: "Add CSV export" });

    assert.equal(violations.length, 1);
    assert.equal(violations[0]?.ruleId, "contract.required");
    assert.equal(violations[0]?.severity, "error");
    assert.equal(violations[0]?.location, "requirements");
    assert.equal(violations[0]?.message, "Missing required field: requirements");
    assert.equal(hasBlockingViolations(violations), true);
  });

  it("should order checks as required, type, then rules", () => {
    const violations = validator.validateOutput("build_test", {
      build_success: "yes",
    });

    assert.deepEqual(
      violations.map((v) => [v.ruleId, v.location]),
      [
        ["contract.required", "test_success"],
        ["contract.type", "build_success"],
        ["BUILD-001", "build_success"],
        ["TEST-001", "test_success"],
      ],
    );
    assert.equal(violations[1]?.message, "Field build_success must be a boolean, got string");
  });

  it("should check enums and array item types", () => {
    const violations = validator.validateOutput("review", {
      verdict: "maybe",
      security_concerns: ["ok", 3],
    });

    assert.deepEqual(
      violations.map((v) => [v.ruleId, v.location]),
      [
        ["contract.type", "security_concerns[1]"],
        ["contract.enum", "verdict"],
        ["REV-001", "verdict"],
        ["REV-003", "security_concerns"],
      ],
    );
  });

  it("should check patterns", () => {
    const violations = validator.validateOutput("integration", {
      integrated: true,
      commit_sha: "HEAD",
    });

    assert.equal(violations.length, 1);
    assert.equal(violations[0]?.ruleId, "contract.pattern");
  });

  it("should keep warnings non-blocking", () => {
    const violations = validator.validateOutput("review", { verdict: "pass", quality_score: 40 });

    assert.deepEqual(violations.map((v) => v.ruleId), ["REV-002"]);
    assert.equal(violations[0]?.severity, "warning");
    assert.equal(hasBlockingViolations(violations), false);
  });

  it("should carry the suggested fix from the rule", () => {
    const violations = validator.validateOutput("requirements", {
      requirements: [{ id: "R1" }],
      acceptance_criteria: ["x"],
    });

    assert.equal(violations.length, 1);
    assert.equal(violations[0]?.ruleId, "REQ-002");
    assert.equal(violations[0]?.suggestedFix, "Add an id and a description to every requirement");
    assert.ok(Object.isFrozen(violations[0]));
  });

  it("should reject a payload that is not an object", () => {
    const violations = validator.validateInput("review", ["not", "an", "object"]);

    assert.equal(violations.length, 1);
    assert.equal(violations[0]?.ruleId, "contract.shape");
    assert.equal(violations[0]?.message, "input of review must be an object, got array");
  });

  it("should throw for an unknown contract", () => {
    assert.throws(() => validator.validateInput("deployment", {}), SchemaNotFoundError);
  });

  describe("versions", () => {
    const versioned = versionedValidator();

    it("should expose the newest version as current", () => {
      assert.equal(versioned.getSchema("deploy").version, "1.2");
      assert.equal(versioned.getSchema("deploy", "1.0").source, "deploy-1.0.yaml");
      assert.deepEqual(versioned.listContracts(), [
        { name: "deploy", current: "1.2", versions: ["1.2", "1.0"] },
      ]);
    });

    it("should throw for a version that was never loaded", () => {
      assert.throws(() => versioned.getSchema("deploy", "1.1"), /deploy@1\.1/);
    });

    it("should name the version that introduced a missing field for older payloads", () => {
      const violations = versioned.validateOutput("deploy", { contractVersion: "1.0", target: "prod" });

      assert.deepEqual(
        violations.map((v) => [v.ruleId, v.severity]),
        [
          ["contract.version", "info"],
          ["contract.required", "error"],
        ],
      );
      assert.equal(violations[1]?.message, "Missing required field: region (required since 1.2)");
    });

    it("should accept an older payload that carries every current field", () => {
      const violations = versioned.validateOutput("deploy", {
        contractVersion: "1.1",
        target: "prod",
        region: "eu",
      });

      assert.equal(hasBlockingViolations(violations), false);
    });

    it("should reject a different major version", () => {
      const violations = versioned.validateOutput("deploy", {
        contractVersion: "2.0",
        target: "prod",
        region: "eu",
      });

      assert.deepEqual(violations.map((v) => [v.ruleId, v.severity]), [["contract.version", "error"]]);
    });

    it("should warn about a newer minor version", () => {
      const violations = versioned.validateOutput("deploy", {
        contractVersion: "1.4",
        target: "prod",
        region: "eu",
      });

      assert.deepEqual(violations.map((v) => [v.ruleId, v.severity]), [["contract.version", "warning"]]);
    });

    it("should reject a malformed version", () => {
      const violations = versioned.validateOutput("deploy", { contractVersion: 1, target: "prod", region: "eu" });

      assert.equal(violations[0]?.severity, "error");
      assert.match(violations[0]?.message ?? "", /must look like/);
    });
  });
});
