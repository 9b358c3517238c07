/**
 * backend/src/shared/security/password-policy.ts
 *
 * WHY:
 * - One password policy for registration, reset completion and password change.
 * - Rules are checked in a fixed order; the first violation is what the client sees.
 *
 * RULES (in order):
 * 1. at least 8 characters
 * 2. an uppercase letter
 * 3. a lowercase letter
 * 4. a digit
 * 5. a special character from SPECIAL_CHARACTERS
 *
 * Login does NOT apply this policy (existing accounts may predate it).
 */

import { z } from 'zod';

export const PASSWORD_MIN_LENGTH = 8;
export const SPECIAL_CHARACTERS = '!@#$%^&*(),.?":{}|<>';

export const PASSWORD_POLICY_MESSAGES = {
  tooShort: `Password must be at least ${PASSWORD_MIN_LENGTH} characters long.`,
  missingUppercase: 'Password must contain at least one uppercase letter.',
  missingLowercase: 'Password must contain at least one lowercase letter.',
  missingDigit: 'Password must contain at least one digit.',
  missingSpecial: 'Password must contain at least one special character.',
} as const;

type PasswordRule = {
  message: string;
  test: (password: string) => boolean;
};

const RULES: readonly PasswordRule[] = [
  {
    message: PASSWORD_POLICY_MESSAGES.tooShort,
    test: (p) => p.length >= PASSWORD_MIN_LENGTH,
  },
  { message: PASSWORD_POLICY_MESSAGES.missingUppercase, test: (p) => /[A-Z]/.test(p) },
  { message: PASSWORD_POLICY_MESSAGES.missingLowercase, test: (p) => /[a-z]/.test(p) },
  { message: PASSWORD_POLICY_MESSAGES.missingDigit, test: (p) => /[0-9]/.test(p) },
  {
    message: PASSWORD_POLICY_MESSAGES.missingSpecial,
    test: (p) => [...p].some((ch) => SPECIAL_CHARACTERS.includes(ch)),
  },
];

/**
 * Returns every violated rule's message, in policy order.
 * Empty array = password accepted.
 */
export function getPasswordPolicyViolations(password: string): string[] {
  return RULES.filter((rule) => !rule.test(password)).map((rule) => rule.message);
}

export function isStrongPassword(password: string): boolean {
  return getPasswordPolicyViolations(password).length === 0;
}

/**
 * Zod schema for request bodies. Adds one issue per violation, in order,
 * so `issues[0].message` is the first failing rule.
 */
export const strongPasswordSchema = z.string().superRefine((password, ctx) => {
  for (const message of getPasswordPolicyViolations(password)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message });
  }
});
