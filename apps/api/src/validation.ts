import { z } from "zod";

const USERNAME_PATTERN = /^[A-Za-z][A-Za-z0-9_.]*$/;

export const usernameField = z
  .string()
  .trim()
  .min(3, "Please provide a valid name")
  .max(20, "Please provide a valid name")
  .regex(USERNAME_PATTERN, "Usernames must have only letters, numbers, dots or underscores");

export const emailField = z.string().trim().toLowerCase().email().max(64);

export const passwordField = z.string().min(8, "Password must be at least 8 characters").max(72);

const blankToNull = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? null : value;

/**
 * Optional text input: missing, null and blank all become null.
 */
export function optionalText(min: number, max: number) {
  return z
    .preprocess(blankToNull, z.string().trim().min(min).max(max).nullish())
    .transform((value) => value ?? null);
}

export const profileShape = {
  username: usernameField,
  email: emailField,
  firstName: optionalText(1, 50),
  lastName: optionalText(1, 50),
  phone: optionalText(10, 20),
};

/** Keeps the OFFSET bound well inside SQLite's integer range. */
export const MAX_PAGE = 1_000_000_000;

export const pageParam = z.coerce
  .number()
  .int()
  .min(1)
  .catch(1)
  .transform((page) => Math.min(page, MAX_PAGE));

/** Plain decimal ids only; "0x10" or "1e1" do not name a user. */
export const idParam = z
  .string()
  .regex(/^\d+$/)
  .transform(Number)
  .pipe(z.number().int().positive().max(Number.MAX_SAFE_INTEGER));
