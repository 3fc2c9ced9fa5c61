import { z } from "zod";

export const salonBoardCredentialsSchema = z.object({
  url: z.string().url("Salon Board URL must be a valid URL"),
  username: z.string().min(1, "Salon Board username is required"),
  password: z.string().min(1, "Salon Board password is required"),
});

export const googleCredentialsSchema = z.object({
  clientId: z.string().min(1, "Google OAuth client ID is required"),
  clientSecret: z.string().min(1, "Google OAuth client secret is required"),
  refreshToken: z.string().min(1, "Google refresh token is required"),
  calendarId: z.string().min(1).default("primary"),
});

const isoDate = z
  .string()
  .refine((v) => !Number.isNaN(Date.parse(v)), "Must be an ISO-8601 date");

export const runRequestSchema = z
  .object({
    dryRun: z.boolean().default(false),
    from: isoDate.optional(),
    to: isoDate.optional(),
  })
  .refine(
    (body) => !body.from || !body.to || Date.parse(body.from) < Date.parse(body.to),
    { message: "from must be before to", path: ["to"] },
  );

// Query values arrive as strings; instants are normalized to UTC so the ledger can compare them as text.
const isoInstant = isoDate.transform((v) => new Date(v).toISOString());
const pageLimit = z.coerce.number().int().min(1).max(200).default(50);

const startRange = (query: { from?: string; to?: string }) => !query.from || !query.to || query.from < query.to;

export const runsQuerySchema = z
  .object({
    from: isoInstant.optional(),
    to: isoInstant.optional(),
    status: z.enum(["running", "completed", "completed_with_errors", "aborted", "halted", "cancelled"]).optional(),
    limit: pageLimit,
  })
  .refine(startRange, { message: "from must be before to", path: ["to"] });

export const mappingsQuerySchema = z
  .object({
    from: isoInstant.optional(),
    to: isoInstant.optional(),
    status: z.enum(["pending", "synced"]).optional(),
    limit: pageLimit,
  })
  .refine(startRange, { message: "from must be before to", path: ["to"] });

export type SalonBoardCredentials = z.infer<typeof salonBoardCredentialsSchema>;
export type GoogleCredentials = z.infer<typeof googleCredentialsSchema>;
export type RunRequest = z.infer<typeof runRequestSchema>;
export type RunsQuery = z.infer<typeof runsQuerySchema>;
export type MappingsQuery = z.infer<typeof mappingsQuerySchema>;
