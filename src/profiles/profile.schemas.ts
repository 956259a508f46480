import {
  CandidateProfile,
  ExtractedProfileFields,
  TECH_CATEGORIES,
  TechStack,
} from "../shared/types/candidate.types";

const MAX_LIST_ITEMS = 25;
const MAX_TEXT = 200;

export function createEmptyCandidateProfile(): CandidateProfile {
  return {
    consentToStore: false,
  };
}

export function createEmptyTechStack(): TechStack {
  return {
    programming_languages: [],
    frameworks: [],
    databases: [],
    tools: [],
  };
}

export function hasTechItems(techStack: Partial<TechStack> | undefined): boolean {
  if (!techStack) {
    return false;
  }
  return TECH_CATEGORIES.some((category) => (techStack[category]?.length ?? 0) > 0);
}

export function cloneCandidateProfile(profile: CandidateProfile): CandidateProfile {
  const clone: CandidateProfile = { ...profile };
  if (profile.desiredPositions) {
    clone.desiredPositions = [...profile.desiredPositions];
  }
  if (profile.techStack) {
    clone.techStack = {
      programming_languages: [...profile.techStack.programming_languages],
      frameworks: [...profile.techStack.frameworks],
      databases: [...profile.techStack.databases],
      tools: [...profile.techStack.tools],
    };
  }
  return clone;
}

/**
 * Maps the snake_case JSON produced by the extraction prompt onto sparse
 * profile fields. Returns null when the payload is not an object at all.
 */
export function normalizeExtractedFields(raw: unknown): ExtractedProfileFields | null {
  if (!isRecord(raw) || Array.isArray(raw)) {
    return null;
  }

  const fields: ExtractedProfileFields = {};
  const fullName = toText(raw.full_name);
  if (fullName) {
    fields.fullName = fullName;
  }
  const email = toText(raw.email);
  if (email) {
    fields.email = email;
  }
  const phone = toText(raw.phone);
  if (phone) {
    fields.phone = phone;
  }
  const years = toNumericText(raw.years_experience);
  if (years) {
    fields.yearsExperience = years;
  }
  const positions = toStringArray(raw.desired_positions);
  if (positions.length) {
    fields.desiredPositions = positions;
  }
  const location = toText(raw.current_location);
  if (location) {
    fields.currentLocation = location;
  }
  const techStack = toTechStack(raw.tech_stack);
  if (techStack) {
    fields.techStack = techStack;
  }
  const language = toText(raw.language_preference);
  if (language) {
    fields.languagePreference = language;
  }
  return fields;
}

export function toTechStackJson(techStack: TechStack | undefined): string {
  return JSON.stringify(techStack ?? {});
}

function toTechStack(value: unknown): Partial<TechStack> | undefined {
  if (!isRecord(value) || Array.isArray(value)) {
    return undefined;
  }
  const output: Partial<TechStack> = {};
  let hasCategory = false;
  for (const category of TECH_CATEGORIES) {
    if (!(category in value)) {
      continue;
    }
    output[category] = toStringArray(value[category]);
    hasCategory = true;
  }
  return hasCategory ? output : undefined;
}

function toText(value: unknown): string {
  if (typeof value !== "string") {
    return "";
  }
  return value.replace(/\s+/g, " ").trim().slice(0, MAX_TEXT);
}

function toNumericText(value: unknown): string {
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : "";
  }
  return toText(value);
}

function toStringArray(value: unknown): string[] {
  if (typeof value === "string") {
    const single = toText(value);
    return single ? [single] : [];
  }
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .map((item) => toText(item))
    .filter((item) => Boolean(item))
    .slice(0, MAX_LIST_ITEMS);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
