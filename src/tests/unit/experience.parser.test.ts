import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { extractYearsExperience } from "../../profiles/parsers/experience.parser";
import { supplementExtraction } from "../../intake/extraction-fallbacks";

describe("extractYearsExperience", () => {
  it("reads explicit phrasing", () => {
    assert.equal(extractYearsExperience("I have 5 years of experience"), 5);
    assert.equal(extractYearsExperience("Experience: 7"), 7);
    assert.equal(extractYearsExperience("10+ years building APIs"), 10);
    assert.equal(extractYearsExperience("over 3 years in backend work"), 3);
    assert.equal(extractYearsExperience("more than 2.5 years with Go"), 2.5);
  });

  it("sums year ranges when no explicit phrase is present", () => {
    assert.equal(extractYearsExperience("2020-2023 at CompanyX", 2026), 3);
    assert.equal(extractYearsExperience("Acme 2012 to 2015, Globex 2016 to 2020", 2026), 7);
    assert.equal(extractYearsExperience("Jan 2018 - Mar 2020 at Initech", 2026), 2);
  });

  it("clamps future end years to the current year", () => {
    assert.equal(extractYearsExperience("2022 to 2030 at a startup", 2026), 4);
  });

  it("caps derived totals at fifty", () => {
    assert.equal(extractYearsExperience("1950 to 2020 and 1960 to 2000", 2026), 50);
  });

  it("returns zero when nothing matches", () => {
    assert.equal(extractYearsExperience("I enjoy writing software"), 0);
  });
});

describe("supplementExtraction", () => {
  it("fills missing experience from resume text during experience collection", () => {
    const fields = supplementExtraction({}, "Worked at Hooli from 2016 to 2022", "collect_experience", 2026);
    assert.deepEqual(fields, { yearsExperience: "6" });
  });

  it("does not apply a zero fallback result", () => {
    const fields = supplementExtraction({}, "nothing relevant here", "collect_experience", 2026);
    assert.deepEqual(fields, {});
  });

  it("keeps an explicit zero from the model when the text has no signal", () => {
    const fields = supplementExtraction({ yearsExperience: "0" }, "I am new to the field", "collect_experience", 2026);
    assert.deepEqual(fields, { yearsExperience: "0" });
  });

  it("leaves other steps alone", () => {
    const fields = supplementExtraction({}, "2016 to 2022, Python and Docker", "collect_location", 2026);
    assert.deepEqual(fields, {});
  });

  it("scans keywords when the tech stack came back empty", () => {
    const fields = supplementExtraction({}, "Mostly Python with Docker", "collect_tech_stack", 2026);
    assert.deepEqual(fields.techStack, {
      programming_languages: ["python"],
      frameworks: [],
      databases: [],
      tools: ["docker"],
    });
  });
});
