// ─────────────────────────────────────────────────────────────
// Form Pipeline Tests — End-to-end conversion of text lines
// ─────────────────────────────────────────────────────────────

import { describe, it } from "node:test";
import { strict as assert } from "assert";
import fs from "fs";
import path from "path";
import { convertLines } from "../parser/formPipeline";
import { FieldRecord, isDateInputType, isFieldType, isInputType } from "../schema/formSchema";

const FIXTURE = fs.readFileSync(path.join(__dirname, "fixtures", "new-patient-form.txt"), "utf-8").split("\n");

const keys = (spec: readonly FieldRecord[]) => spec.map((r) => r.key);

describe("convertLines", () => {
  it("expands the compound name line", () => {
    const result = convertLines(["First__________________ MI_____ Last_______________________ Nickname_____________"]);
    assert.deepEqual(keys(result.spec), ["first_name", "mi", "last_name", "nickname", "signature", "date_signed"]);
    assert.deepEqual(result.spec[1], {
      key: "mi",
      title: "Middle Initial",
      section: "Patient Information Form",
      optional: false,
      type: "input",
      control: { input_type: "initials" },
    });
    assert.equal(result.orderingMode, "template");
    assert.equal(result.valid, true);
  });

  it("reads a question with glyph options on the next line", () => {
    const result = convertLines(["Sex", "☐ Male ☐ Female"]);
    assert.deepEqual(result.spec[0], {
      key: "sex",
      title: "Sex",
      section: "Patient Information Form",
      optional: false,
      type: "radio",
      control: {
        options: [
          { name: "Male", value: "male" },
          { name: "Female", value: "female" },
        ],
      },
    });
  });

  it("adds a signature and date signed when the document has none", () => {
    const result = convertLines(["Occupation ________"]);
    assert.deepEqual(keys(result.spec), ["occupation", "signature", "date_signed"]);
    assert.deepEqual(result.spec[2].control, { input_type: "past" });
    assert.deepEqual(result.warnings, [
      "No signature line found; added a signature field",
      "No date-signed field found; added one after the signature",
    ]);
  });

  it("yields only signature fields for empty input", () => {
    const result = convertLines([]);
    assert.deepEqual(keys(result.spec), ["signature", "date_signed"]);
    assert.equal(result.valid, true);
    assert.equal(result.orderingMode, "document");
  });

  it("emits nothing for witness signature lines", () => {
    const result = convertLines(["Witness Signature: ________", "Witness Signature: ________"]);
    assert.deepEqual(keys(result.spec), ["signature", "date_signed"]);
    assert.deepEqual(result.warnings.slice(0, 2), [
      'Line 1: excluded "Witness Signature: ________"',
      'Line 2: excluded "Witness Signature: ________"',
    ]);
  });

  it("does not take the dentist's signature line as the patient's", () => {
    const result = convertLines(["Patient Name ____________", "Signature of Dentist ______________ Date ________"]);
    assert.deepEqual(keys(result.spec).slice(-2), ["signature", "date_signed"]);
    assert.ok(result.warnings.includes('Line 2: excluded "Signature of Dentist ______________ Date ________"'));
    assert.ok(result.warnings.includes("No signature line found; added a signature field"));
    assert.ok(result.spec.every((r) => !/dentist/i.test(r.title)));
  });

  it("never numbers a second signature line", () => {
    const result = convertLines([
      "Responsible party",
      "Signature __________ Date _______",
      "Patient Signature ________ Date ______",
    ]);
    assert.deepEqual(keys(result.spec), ["signature", "date_signed"]);
    assert.ok(result.warnings.includes('Line 3: duplicate field "signature" skipped'));
    assert.ok(result.warnings.includes('Line 3: duplicate field "date_signed" skipped'));
  });

  it("classifies a consent form and files its prose under the title", () => {
    const result = convertLines([
      "Informed Consent for Tooth Extraction",
      "I understand that the extraction of a tooth carries risks such as swelling, bleeding and infection.",
      "Possible complications include dry socket and numbness of the lip or tongue.",
      "I consent to the treatment described above and have had my questions answered.",
      "Printed name if signed on behalf of the patient ________",
      "Signature ________ Date ________",
    ]);
    assert.equal(result.formType, "structured_consent");
    assert.deepEqual(keys(result.spec).slice(-3), ["signature", "date_signed", "printed_name_if_signed_on_behalf"]);

    const text = result.spec.find((r) => r.key === "text");
    assert.ok(text);
    assert.equal(text.section, "Informed Consent for Tooth Extraction");

    const printed = result.spec[result.spec.length - 1];
    assert.equal(printed.title, "Printed name if signed on behalf of the patient");
    assert.equal(printed.type, "input");
    assert.deepEqual(printed.control, { input_type: "name" });
  });

  it("reports a general form type for unrecognized documents", () => {
    assert.equal(convertLines(["Favorite Color ________"]).formType, "general");
  });

  it("rejects a repeated label without a distinguishing context", () => {
    const result = convertLines(["City ________", "City ________"]);
    assert.deepEqual(keys(result.spec), ["city", "signature", "date_signed"]);
    assert.equal(result.warnings[0], 'Line 2: duplicate field "city" skipped');
  });

  it("numbers a repeated label under a work address", () => {
    const result = convertLines(["City ________", "Work Address", "City ________"]);
    assert.deepEqual(keys(result.spec), ["city", "city_2", "signature", "date_signed"]);
  });

  it("keeps primary and secondary plan fields apart", () => {
    const result = convertLines([
      "Primary Dental Plan",
      "Name of Insured ________",
      "Secondary Dental Plan",
      "Name of Insured ________",
    ]);
    assert.deepEqual(keys(result.spec), ["name_of_insured", "name_of_insured_2", "signature", "date_signed"]);
    assert.deepEqual(
      result.spec.map((r) => r.section),
      ["Primary Dental Plan", "Secondary Dental Plan", "Signature", "Signature"]
    );
  });

  it("falls back to document order for unfamiliar forms", () => {
    const result = convertLines(["Favorite Color ________", "Pet Name ________"]);
    assert.equal(result.orderingMode, "document");
    assert.equal(result.template, null);
    assert.deepEqual(keys(result.spec), ["favorite_color", "pet_name", "signature", "date_signed"]);
    assert.equal(result.spec[0].title, "Favorite Color");
  });

  it("applies config overrides", () => {
    const result = convertLines(["Sex ☐ Male ☐ Female"], { templateOverlapThreshold: 1 });
    assert.equal(result.orderingMode, "document");
    assert.throws(() => convertLines([], { contextWindow: -1 }), /contextWindow/);
  });

  it("converts a full new patient form", () => {
    const result = convertLines(FIXTURE);
    assert.deepEqual(keys(result.spec), [
      "todays_date",
      "first_name",
      "mi",
      "last_name",
      "nickname",
      "street",
      "apt_unit_suite",
      "city",
      "state",
      "zip",
      "mobile",
      "home",
      "work",
      "e_mail",
      "drivers_license",
      "date_of_birth",
      "occupation",
      "city_2",
      "state_3",
      "zip_2",
      "sex",
      "marital_status",
      "text",
      "signature",
      "date_signed",
    ]);
    assert.equal(result.template, "new-patient-form");
    assert.equal(result.formType, "patient_info");
    assert.equal(result.valid, true);
    assert.equal(result.sectionCount, 2);
    assert.deepEqual(result.warnings, ['Line 15: excluded "Witness Signature: ________"']);

    const text = result.spec[22];
    const sentence = "I understand that I am responsible for all fees and I agree to pay for treatment provided.";
    assert.deepEqual(text, {
      key: "text",
      title: "",
      section: "Signature",
      optional: false,
      type: "text",
      control: { html_text: `<p>${sentence}</p>`, temporary_html_text: `<p>${sentence}</p>`, text: sentence },
    });
  });
});

describe("output properties", () => {
  const inputs: string[][] = [
    FIXTURE,
    [],
    ["Signature ____", "Signature ____", "Patient Signature ____"],
    ["Allergies:", "__________", "Are you a smoker? Yes/No", "Doctor Signature ________", "Occupation ________"],
    ["# Medical History", "☐ Asthma ☐ Diabetes ☐ Epilepsy ☐ Hepatitis", "Initials ____", "Initials ____"],
    ["Patient Name ____", "Signature of Dentist ______ Date ____", "Doctor's Name ________"],
  ];

  for (const [n, input] of inputs.entries()) {
    it(`holds the output contract for input ${n + 1}`, () => {
      const { spec } = convertLines(input);
      const keyList = keys(spec);
      assert.equal(new Set(keyList).size, keyList.length);

      const signatures = spec.filter((r) => r.type === "signature");
      assert.equal(signatures.length, 1);
      assert.equal(signatures[0].key, "signature");

      const dateSigned = spec.find((r) => r.key === "date_signed");
      assert.ok(dateSigned);
      assert.equal(dateSigned.type, "date");
      assert.equal(dateSigned.control.input_type, "past");

      for (const record of spec) {
        assert.ok(isFieldType(record.type), record.type);
        if (record.type === "input") {
          assert.ok(isInputType(record.control.input_type));
        }
        if (record.type === "date" && record.control.input_type !== undefined) {
          assert.ok(isDateInputType(record.control.input_type));
        }
        assert.ok(!/witness/i.test(record.key) && !/witness/i.test(record.title));
        assert.ok(!/dentist|doctor/i.test(record.key) && !/dentist|doctor/i.test(record.title), record.title);
      }
    });
  }
});
