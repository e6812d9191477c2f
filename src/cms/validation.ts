import { z } from "zod";
import { SecurityException, ValidationError } from "./errors";

export const EMAIL_PATTERN =
  /^[a-zA-Z0-9.!#$%&'*+/=?^_`{|}~-]+@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;
export const USERNAME_PATTERN = /^[a-zA-Z0-9_]+$/;
// Only the first character is constrained to the allowed set; the lookaheads cover the rest.
export const PASSWORD_PATTERN = /^(?=.*[a-z])(?=.*[A-Z])(?=.*\d)(?=.*[@$!%*?&])[A-Za-z\d@$!%*?&]/;

export function isValidEmail(email: unknown): boolean {
  if (typeof email !== "string" || email.length === 0) {
    return false;
  }
  return EMAIL_PATTERN.test(email.trim().toLowerCase());
}

export function isValidUsername(username: unknown): boolean {
  if (typeof username !== "string" || username.length === 0) {
    return false;
  }
  return username.length >= 3 && username.length <= 30 && USERNAME_PATTERN.test(username);
}

export function isValidPassword(password: unknown): boolean {
  if (typeof password !== "string" || password.length === 0) {
    return false;
  }
  return password.length >= 8 && password.length <= 128 && PASSWORD_PATTERN.test(password);
}

const emailField = z
  .string()
  .trim()
  .refine(isValidEmail, "Not a valid email address.")
  .transform((value) => value.toLowerCase());

export const registrationSchema = z.object({
  email: emailField,
  username: z
    .string()
    .min(3)
    .max(30)
    .regex(USERNAME_PATTERN, "Username can only contain letters, numbers, and underscores"),
  password: z
    .string()
    .min(8)
    .max(128)
    .regex(PASSWORD_PATTERN, "Password must contain uppercase, lowercase, number, and special character"),
  first_name: z.string().max(50).default(""),
  last_name: z.string().max(50).default("")
});

export const loginSchema = z.object({
  email: emailField,
  password: z.string().min(1)
});

export const passwordChangeSchema = z.object({
  current_password: z.string().default(""),
  new_password: z.string().default("")
});

export const TITLE_MAX_LENGTH = 255;
export const CATEGORY_NAME_MAX_LENGTH = 100;

const categoryIdField = z
  .number({ invalid_type_error: "category_id must be an integer or null" })
  .int("category_id must be an integer or null")
  .positive("category_id must be an integer or null")
  .nullable();

export const articleCreateSchema = z.object({
  title: z.string({ required_error: "Title is required", invalid_type_error: "Title must be a string" }),
  content: z.string({ required_error: "Content is required", invalid_type_error: "Content must be a string" }),
  excerpt: z.string({ invalid_type_error: "Excerpt must be a string" }).nullish(),
  category_id: categoryIdField.optional(),
  is_published: z.boolean({ invalid_type_error: "is_published must be a boolean" }).optional()
});

export const articleUpdateSchema = articleCreateSchema.partial();

export const categoryCreateSchema = z.object({
  name: z.string({ required_error: "Category name is required", invalid_type_error: "Category name must be a string" }),
  description: z.string({ invalid_type_error: "Description must be a string" }).nullish(),
  is_active: z.boolean({ invalid_type_error: "is_active must be a boolean" }).optional()
});

export const categoryUpdateSchema = categoryCreateSchema.partial();

/** Credential payloads: a malformed body is treated as hostile input. */
export function parseWithSchema<Schema extends z.ZodTypeAny>(schema: Schema, data: unknown): z.output<Schema> {
  const result = schema.safeParse(data ?? {});
  if (!result.success) {
    throw new SecurityException("Invalid input data", {
      details: { validation_errors: result.error.flatten().fieldErrors }
    });
  }
  return result.data;
}

/** Content payloads: the first problem becomes the message a client sees. */
export function parseBody<Schema extends z.ZodTypeAny>(schema: Schema, data: unknown): z.output<Schema> {
  const result = schema.safeParse(data ?? {});
  if (!result.success) {
    const firstIssue = result.error.issues[0];
    throw new ValidationError(firstIssue?.message ?? "Invalid request body", {
      details: { validation_errors: result.error.flatten().fieldErrors }
    });
  }
  return result.data;
}

export function requireTrimmedText(value: string, emptyMessage: string, maxLength: number, tooLongMessage: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(emptyMessage);
  }
  if (trimmed.length > maxLength) {
    throw new ValidationError(tooLongMessage);
  }
  return trimmed;
}

export function optionalTrimmedText(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : null;
}
