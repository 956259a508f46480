import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { createEmptyCandidateProfile } from "../../profiles/profile.schemas";
import { assertTransition } from "../../state/state-machine";
import {
  incompletePrompt,
  isStepComplete,
  missingInfoParts,
  missingProfileFields,
  progressFor,
} from "../../state/step-rules";
import { STEP_ORDER, nextStep } from "../../state/transition-rules";

describe("step rules", () => {
  it("progress is monotonic across the step order", () => {
    const values = STEP_ORDER.map((step) => progressFor(step));
    assert.deepEqual(values, [0, 10, 25, 40, 55, 70, 85, 95, 100]);
  });

  it("walks forward one step at a time", () => {
    assert.equal(nextStep("collect_info"), "collect_experience");
    assert.equal(nextStep("collect_tech_stack"), "generate_questions");
    assert.equal(nextStep("conclusion"), "conclusion");
  });

  it("rejects skipped or backwards transitions", () => {
    assert.throws(() => assertTransition("collect_info", "collect_location"), /Invalid transition/);
    assert.throws(() => assertTransition("collect_location", "collect_info"), /Invalid transition/);
    assert.doesNotThrow(() => assertTransition("collect_location", "conclusion"));
    assert.doesNotThrow(() => assertTransition("ask_questions", "greeting"));
  });

  it("names exactly the missing contact fields", () => {
    const profile = { ...createEmptyCandidateProfile(), email: "jane@example.com" };
    assert.deepEqual(missingInfoParts(profile), ["full name", "phone number"]);
    assert.equal(
      incompletePrompt("collect_info", profile),
      "Thank you! I still need your full name, phone number. Could you please provide that?",
    );
  });

  it("falls back to the generic prompt when all contact fields are missing", () => {
    assert.equal(
      incompletePrompt("collect_info", createEmptyCandidateProfile()),
      "Could you please share your full name, email address, and phone number?",
    );
  });

  it("treats an explicit zero as collected experience", () => {
    const profile = { ...createEmptyCandidateProfile(), yearsExperience: 0 };
    assert.equal(isStepComplete("collect_experience", profile), true);
    assert.equal(isStepComplete("collect_experience", createEmptyCandidateProfile()), false);
  });

  it("requires at least one tech item", () => {
    const empty = {
      ...createEmptyCandidateProfile(),
      techStack: { programming_languages: [], frameworks: [], databases: [], tools: [] },
    };
    assert.equal(isStepComplete("collect_tech_stack", empty), false);
    const filled = { ...empty, techStack: { ...empty.techStack, tools: ["Git"] } };
    assert.equal(isStepComplete("collect_tech_stack", filled), true);
  });

  it("lists missing profile fields for the reply prompt", () => {
    const profile = {
      ...createEmptyCandidateProfile(),
      fullName: "Jane Doe",
      email: "jane@example.com",
      phone: "5550100199",
      currentLocation: "Lisbon",
    };
    assert.deepEqual(missingProfileFields(profile), ["years_experience", "desired_positions", "tech_stack"]);
  });
});
