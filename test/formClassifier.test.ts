// ─────────────────────────────────────────────────────────────
// Form Classifier Tests
// ─────────────────────────────────────────────────────────────

import { describe, it } from "node:test";
import { strict as assert } from "assert";
import { classifyForm, detectConsentTitle, FormTypeRule, isConsentForm } from "../parser/formClassifier";

const EXTRACTION_CONSENT = [
  "Informed Consent for Tooth Extraction",
  "I understand that the extraction of a tooth carries risks such as swelling, bleeding and infection.",
  "I consent to the treatment described above and have had my questions answered.",
  "Signature ________ Date ________",
];

describe("classifyForm", () => {
  it("recognizes a patient intake form by its vocabulary", () => {
    const result = classifyForm(["Date of Birth ____", "Marital Status ☐ Single ☐ Married", "Occupation ____"]);
    assert.deepEqual(result, { type: "patient_info", rule: "patient-info-vocabulary" });
  });

  it("recognizes a records release", () => {
    const result = classifyForm(["Authorization to Release Dental Records", "I authorize the release of my records"]);
    assert.deepEqual(result, { type: "records_release", rule: "records-release" });
  });

  it("recognizes a structured consent", () => {
    assert.deepEqual(classifyForm(EXTRACTION_CONSENT), { type: "structured_consent", rule: "structured-consent" });
  });

  it("falls back to narrative consent wording", () => {
    assert.deepEqual(classifyForm(["Risks and benefits were explained to me"]), {
      type: "narrative_consent",
      rule: "narrative-consent",
    });
  });

  it("reads new patient questions as patient info", () => {
    const result = classifyForm(["Preferred method of contact ____", "Employed by ____"]);
    assert.deepEqual(result, { type: "patient_info", rule: "new-patient-vocabulary" });
  });

  it("defaults to general", () => {
    assert.deepEqual(classifyForm([]), { type: "general", rule: "none" });
    assert.deepEqual(classifyForm(["Favorite Color ____"]), { type: "general", rule: "none" });
  });

  it("accepts a custom rule table", () => {
    const rules: FormTypeRule[] = [{ name: "any-color", type: "general", matches: (t) => t.includes("color") }];
    assert.deepEqual(classifyForm(["Favorite COLOR ____"], rules), { type: "general", rule: "any-color" });
  });
});

describe("isConsentForm", () => {
  it("is true only for consent types", () => {
    assert.equal(isConsentForm("structured_consent"), true);
    assert.equal(isConsentForm("narrative_consent"), true);
    assert.equal(isConsentForm("records_release"), false);
    assert.equal(isConsentForm("patient_info"), false);
  });
});

describe("detectConsentTitle", () => {
  it("returns the title line of a consent form", () => {
    assert.equal(detectConsentTitle(EXTRACTION_CONSENT), "Informed Consent for Tooth Extraction");
  });

  it("strips markdown heading marks", () => {
    assert.equal(detectConsentTitle(["# **Consent for Root Canal Therapy**"]), "Consent for Root Canal Therapy");
  });

  it("prefers an informed consent title over an earlier generic one", () => {
    assert.equal(
      detectConsentTitle(["Patient Consent Form", "Informed Consent for Implant Surgery"]),
      "Informed Consent for Implant Surgery"
    );
  });

  it("skips long sentences and blank-bearing lines", () => {
    assert.equal(
      detectConsentTitle([
        "I consent to the treatment described above and have had my questions answered.",
        "Consent signature ________",
      ]),
      null
    );
  });

  it("returns null without consent wording", () => {
    assert.equal(detectConsentTitle(["Patient Information"]), null);
  });
});
