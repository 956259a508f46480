import { ValidatedField } from "../shared/types/candidate.types";

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const PHONE_PATTERN = /^[\d\s\-+()]{10,}$/;

export function isValidEmail(value: string): boolean {
  if (!value || !value.trim()) {
    return false;
  }
  return EMAIL_PATTERN.test(value);
}

export function isValidPhone(value: string): boolean {
  if (!value || !value.trim()) {
    return false;
  }
  return PHONE_PATTERN.test(value);
}

export function isValidName(value: string): boolean {
  if (!value || !value.trim()) {
    return false;
  }
  return value.trim().length >= 2;
}

export function isValidExperience(value: string): boolean {
  if (!value || !value.trim()) {
    return false;
  }
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) && parsed >= 0;
}

export const FIELD_VALIDATORS: Record<ValidatedField, (value: string) => boolean> = {
  fullName: isValidName,
  email: isValidEmail,
  phone: isValidPhone,
  yearsExperience: isValidExperience,
};

export const FIELD_REJECTION_MESSAGES: Record<ValidatedField, string> = {
  fullName: "Please provide a valid name.",
  email: "Please provide a valid email address.",
  phone: "Please provide a valid phone number.",
  yearsExperience: "Please provide a valid number for years of experience.",
};
