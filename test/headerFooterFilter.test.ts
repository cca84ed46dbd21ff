// ─────────────────────────────────────────────────────────────
// Header/Footer Filter Tests
// ─────────────────────────────────────────────────────────────

import { describe, it } from "node:test";
import { strict as assert } from "assert";
import { filterTextLines, keepPart, matchBoilerplate, removeHeadersFooters } from "../parser/headerFooterFilter";

describe("matchBoilerplate", () => {
  it("names the letterhead pattern a line matches", () => {
    assert.equal(matchBoilerplate("Tel (555) 010-1234"), "phone");
    assert.equal(matchBoilerplate("frontdesk@example.com"), "email");
    assert.equal(matchBoilerplate("www.example.com"), "website");
    assert.equal(matchBoilerplate("123 Main Street"), "street-address");
    assert.equal(matchBoilerplate("Springfield, IL 62701"), "city-state-zip");
    assert.equal(matchBoilerplate("Page 2 of 3"), "page-number");
    assert.equal(matchBoilerplate("© 2024 Example Dental Group"), "copyright");
    assert.equal(matchBoilerplate("Rev. 03/2021"), "revision");
  });

  it("recognizes practice names and version stamps", () => {
    assert.equal(matchBoilerplate("Lakeside Family Dentistry"), "practice-name");
    assert.equal(matchBoilerplate("Riverside Orthodontics"), "practice-name");
    assert.equal(matchBoilerplate("Consent for Oral Surgery"), null);
    assert.equal(matchBoilerplate("Version 2.1"), "version");
    assert.equal(matchBoilerplate("CONFIDENTIAL"), "version");
  });

  it("drops empty and letter-free lines", () => {
    assert.equal(matchBoilerplate("   "), "empty");
    assert.equal(matchBoilerplate("12/34"), "no-letters");
  });

  it("keeps lines that carry blanks or glyphs", () => {
    assert.equal(matchBoilerplate("Phone ______ 555-010-1234"), null);
    assert.equal(matchBoilerplate("☐ Yes ☐ No"), null);
    assert.equal(matchBoilerplate("First Name"), null);
  });

  it("ignores address patterns inside long sentences", () => {
    const sentence =
      "I understand that the office at 123 Main Street will keep my records confidential and share them only with my consent.";
    assert.equal(matchBoilerplate(sentence), null);
  });
});

describe("keepPart", () => {
  it("salvages a consent title printed beside the website", () => {
    assert.equal(keepPart("www.example.com Informed Consent for Extraction"), "Informed Consent for Extraction");
  });

  it("drops contact lines without a title", () => {
    assert.equal(keepPart("www.example.com (555) 010-1234"), null);
  });

  it("returns content lines trimmed", () => {
    assert.equal(keepPart("  Occupation ________ "), "Occupation ________");
  });
});

describe("removeHeadersFooters", () => {
  it("keeps form content in order", () => {
    const lines = ["Smile Dental", "123 Main Street", "First__________", "", "Page 1 of 2"];
    assert.deepEqual(removeHeadersFooters(lines), ["Smile Dental", "First__________"]);
  });
});

describe("filterTextLines", () => {
  it("renumbers surviving lines densely", () => {
    const filtered = filterTextLines([
      { text: "Page 1", index: 0, fromTable: false },
      { text: "Sex ☐ Male ☐ Female", index: 1, fromTable: true },
      { text: "www.example.com", index: 2, fromTable: false },
      { text: "Occupation ________", index: 3, fromTable: false },
      { text: "frontdesk@example.com Informed Consent", index: 4, fromTable: false },
    ]);
    assert.deepEqual(filtered, [
      { text: "Sex ☐ Male ☐ Female", index: 0, fromTable: true },
      { text: "Occupation ________", index: 1, fromTable: false },
      { text: "Informed Consent", index: 2, fromTable: false },
    ]);
  });
});
