import {
  CandidateProfile,
  ExtractedProfileFields,
  ProfileUpdate,
  TECH_CATEGORIES,
  ValidatedField,
  ValidationRejection,
} from "../shared/types/candidate.types";
import { FIELD_REJECTION_MESSAGES, FIELD_VALIDATORS } from "./profile.validators";
import { cloneCandidateProfile, createEmptyTechStack } from "./profile.schemas";

export interface SanitizedUpdate {
  update: ProfileUpdate;
  rejections: ValidationRejection[];
}

type TextField = "fullName" | "email" | "phone" | "currentLocation" | "languagePreference";

const TEXT_FIELDS: ReadonlyArray<TextField> = ["fullName", "email", "phone", "currentLocation", "languagePreference"];
const VALIDATED_FIELDS: ReadonlyArray<ValidatedField> = ["email", "phone", "fullName", "yearsExperience"];

/**
 * Drops every extracted scalar that fails its format check. Rejections are
 * returned for user feedback; nothing is thrown.
 */
export function sanitizeProfileUpdate(fields: ExtractedProfileFields): SanitizedUpdate {
  const rejections: ValidationRejection[] = [];
  const accepted = new Set<ValidatedField>();

  for (const field of VALIDATED_FIELDS) {
    const value = fields[field];
    if (value === undefined) {
      continue;
    }
    if (FIELD_VALIDATORS[field](value)) {
      accepted.add(field);
      continue;
    }
    rejections.push({ field, value, message: FIELD_REJECTION_MESSAGES[field] });
  }

  const update: ProfileUpdate = {};
  if (fields.desiredPositions) {
    update.desiredPositions = fields.desiredPositions;
  }
  if (fields.currentLocation) {
    update.currentLocation = fields.currentLocation;
  }
  if (fields.techStack) {
    update.techStack = fields.techStack;
  }
  if (fields.languagePreference) {
    update.languagePreference = fields.languagePreference;
  }
  if (accepted.has("fullName")) {
    update.fullName = fields.fullName;
  }
  if (accepted.has("email")) {
    update.email = fields.email;
  }
  if (accepted.has("phone")) {
    update.phone = fields.phone;
  }
  if (accepted.has("yearsExperience") && fields.yearsExperience !== undefined) {
    update.yearsExperience = Number(fields.yearsExperience.trim());
  }

  return { update, rejections };
}

/**
 * Last non-empty value wins for scalars; lists and tech categories are
 * unioned. An empty or absent incoming value never clears existing data.
 */
export function mergeProfile(profile: CandidateProfile, update: ProfileUpdate): CandidateProfile {
  const merged = cloneCandidateProfile(profile);

  for (const field of TEXT_FIELDS) {
    const value = update[field];
    if (typeof value === "string" && value.trim()) {
      merged[field] = value.trim();
    }
  }
  if (typeof update.yearsExperience === "number" && Number.isFinite(update.yearsExperience)) {
    merged.yearsExperience = update.yearsExperience;
  }

  if (update.desiredPositions && update.desiredPositions.length > 0) {
    merged.desiredPositions = unionStrings(merged.desiredPositions ?? [], update.desiredPositions);
  }

  const incomingStack = update.techStack;
  if (incomingStack && TECH_CATEGORIES.some((category) => category in incomingStack)) {
    const base = merged.techStack ?? createEmptyTechStack();
    for (const category of TECH_CATEGORIES) {
      base[category] = unionStrings(base[category], incomingStack[category] ?? []);
    }
    merged.techStack = base;
  }

  return merged;
}

export function unionStrings(existing: ReadonlyArray<string>, incoming: ReadonlyArray<string>): string[] {
  const output = [...existing];
  const seen = new Set(existing);
  for (const item of incoming) {
    const trimmed = item.trim();
    if (!trimmed || seen.has(trimmed)) {
      continue;
    }
    seen.add(trimmed);
    output.push(trimmed);
  }
  return output;
}
