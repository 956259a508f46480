export const TECH_CATEGORIES = ["programming_languages", "frameworks", "databases", "tools"] as const;

export type TechCategory = (typeof TECH_CATEGORIES)[number];

export type TechStack = Record<TechCategory, string[]>;

export interface CandidateProfile {
  fullName?: string;
  email?: string;
  phone?: string;
  yearsExperience?: number;
  desiredPositions?: string[];
  currentLocation?: string;
  techStack?: TechStack;
  languagePreference?: string;
  consentToStore: boolean;
}

/**
 * Sparse update as extracted from one message, before validation.
 * Scalars stay strings so the field validators can judge the raw text.
 */
export interface ExtractedProfileFields {
  fullName?: string;
  email?: string;
  phone?: string;
  yearsExperience?: string;
  desiredPositions?: string[];
  currentLocation?: string;
  techStack?: Partial<TechStack>;
  languagePreference?: string;
}

/** Validated update accepted by the merge engine. */
export interface ProfileUpdate {
  fullName?: string;
  email?: string;
  phone?: string;
  yearsExperience?: number;
  desiredPositions?: string[];
  currentLocation?: string;
  techStack?: Partial<TechStack>;
  languagePreference?: string;
}

export type ValidatedField = "fullName" | "email" | "phone" | "yearsExperience";

export interface ValidationRejection {
  field: ValidatedField;
  value: string;
  message: string;
}
