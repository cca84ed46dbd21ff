// ─────────────────────────────────────────────────────────────
// JSON Export Tests
// ─────────────────────────────────────────────────────────────

import { after, describe, it } from "node:test";
import { strict as assert } from "assert";
import fs from "fs";
import os from "os";
import path from "path";
import { buildReport, exportSpec, sanitizeFilename } from "../export/jsonExport";
import { convertLines } from "../parser/formPipeline";

const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "form-export-"));

after(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("exportSpec", () => {
  const result = convertLines(["Occupation ________"]);

  it("writes the spec and an optional report", () => {
    const outDir = path.join(tmpDir, "out");
    const paths = exportSpec(result, outDir, { filename: "New Patient Form!", report: true, sourceFile: "intake.pdf" });

    assert.equal(paths.specPath, path.join(outDir, "new-patient-form.modento.json"));
    assert.equal(paths.reportPath, path.join(outDir, "new-patient-form.report.json"));

    const written = fs.readFileSync(paths.specPath, "utf-8");
    assert.ok(written.endsWith("]\n"));
    assert.deepEqual(JSON.parse(written), result.spec);

    const report: unknown = JSON.parse(fs.readFileSync(path.join(outDir, "new-patient-form.report.json"), "utf-8"));
    assert.deepEqual(report, buildReport(result, "intake.pdf"));
  });

  it("skips the report unless asked", () => {
    const paths = exportSpec(result, tmpDir, { filename: "plain" });
    assert.equal(paths.reportPath, null);
    assert.ok(!fs.existsSync(path.join(tmpDir, "plain.report.json")));
  });

  it("keeps non-ASCII characters as written", () => {
    const accented = convertLines(["Niño Name ________"]);
    const { specPath } = exportSpec(accented, tmpDir, { filename: "accented" });
    assert.ok(fs.readFileSync(specPath, "utf-8").includes('"title": "Niño Name"'));
  });
});

describe("buildReport", () => {
  it("summarizes counts and messages", () => {
    const result = convertLines(["Occupation ________"]);
    assert.deepEqual(buildReport(result), {
      sourceFile: null,
      valid: true,
      formType: "general",
      fieldCount: 3,
      sectionCount: 2,
      orderingMode: "template",
      template: "new-patient-form",
      errors: [],
      warnings: [
        "No signature line found; added a signature field",
        "No date-signed field found; added one after the signature",
      ],
    });
  });
});

describe("sanitizeFilename", () => {
  it("produces a safe lowercase stem", () => {
    assert.equal(sanitizeFilename("Café Form"), "caf-form");
    assert.equal(sanitizeFilename("***"), "form");
  });
});
