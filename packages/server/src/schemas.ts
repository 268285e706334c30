/**
 * Zod schemas for validating tool inputs
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";
import { ROLES } from "@shelter-records/sdk";

const MAX_RESULTS = 1000;
const MAX_TREND_MONTHS = 120;

export const TokenSchema = z.string().min(1, "token must be non-empty");

// Field name to literal or operator mapping; operators are interpreted by the matcher
export const RecordQuerySchema = z.record(z.string(), z.unknown());

export const RecordSchema = z
  .record(z.string(), z.unknown())
  .refine((record) => Object.keys(record).length > 0, "record must have at least one field");

export const PatchSchema = z
  .record(z.string(), z.unknown())
  .refine((patch) => Object.keys(patch).length > 0, "patch must set at least one field");

export const UsernameSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9_.@-]+$/, "username may only contain letters, numbers, underscore, dash, dot and @");

// Tool input schemas

export const LoginInputSchema = z.object({
  username: UsernameSchema,
  password: z.string().min(1, "password must be non-empty"),
});

export const QueryRecordsInputSchema = z.object({
  token: TokenSchema,
  query: RecordQuerySchema.default({}),
  limit: z.number().int().positive().max(MAX_RESULTS, `limit cannot exceed ${MAX_RESULTS}`).default(100),
});

export const CreateRecordInputSchema = z.object({
  token: TokenSchema,
  record: RecordSchema,
});

export const UpdateRecordsInputSchema = z.object({
  token: TokenSchema,
  query: RecordQuerySchema,
  patch: PatchSchema,
  multiple: z.boolean().default(false),
});

export const DeleteRecordsInputSchema = z.object({
  token: TokenSchema,
  query: RecordQuerySchema,
  multiple: z.boolean().default(false),
});

export const EmptyInputSchema = z.object({}).strict();

export const RescueAnalyticsInputSchema = z.object({
  applyAgeWindow: z.boolean().default(true),
});

export const AdoptionTrendsInputSchema = z.object({
  months: z
    .number()
    .int()
    .positive()
    .max(MAX_TREND_MONTHS, `months cannot exceed ${MAX_TREND_MONTHS}`)
    .default(12),
});

export const ExportStatsInputSchema = z.object({
  query: RecordQuerySchema.default({}),
});

export const CreateUserInputSchema = z.object({
  token: TokenSchema,
  username: UsernameSchema,
  password: z.string().min(1, "password must be non-empty"),
  role: z.enum(ROLES).default("viewer"),
  email: z.string().email().optional(),
});

export const ListUsersInputSchema = z.object({
  token: TokenSchema,
});

export const DeactivateUserInputSchema = z.object({
  token: TokenSchema,
  username: UsernameSchema,
});

export type QueryRecordsInput = z.infer<typeof QueryRecordsInputSchema>;
export type CreateUserInput = z.infer<typeof CreateUserInputSchema>;
