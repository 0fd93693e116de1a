/**
 * Submission keys: SHA-256 over the canonical language tag and the trimmed source
 */

import { createHash } from "crypto";
import { Language } from "../types";

const SUBMISSION_HASH = /^[a-f0-9]{64}$/;

export function normalizeSource(code: string): string {
  return code.trim();
}

export function computeSubmissionHash(code: string, language: Language): string {
  return createHash("sha256").update(`${language}:${normalizeSource(code)}`, "utf8").digest("hex");
}

export function isSubmissionHash(value: string): boolean {
  return SUBMISSION_HASH.test(value);
}
