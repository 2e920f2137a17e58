import { z } from "zod";

export const MAX_PROMPT_LENGTH = 8_000;
export const MAX_SYMBOLS = 25;
export const MAX_RECIPIENTS = 20;

const prompt = z.string().max(MAX_PROMPT_LENGTH);
const symbols = z.array(z.string().max(16)).max(MAX_SYMBOLS);
const emailTo = z.array(z.string().email()).max(MAX_RECIPIENTS);

/** POST /api/schedules. `recurrence` is checked by the recurrence parser. */
export const CreateScheduleBody = z.object({
  title: z.string().max(200).nullable().optional(),
  prompt: prompt.optional(),
  symbols: symbols.optional(),
  recurrence: z.unknown(),
  emailTo: emailTo.optional(),
  attachPdf: z.boolean().optional(),
  deepResearch: z.boolean().optional(),
  active: z.boolean().optional(),
});

/** PUT /api/schedules/:id */
export const UpdateScheduleBody = CreateScheduleBody.partial();

/** POST /api/run-once */
export const RunOnceBody = z.object({
  title: z.string().max(200).nullable().optional(),
  prompt: prompt.optional(),
  symbols: symbols.optional(),
  emailTo: emailTo.optional(),
  attachPdf: z.boolean().optional(),
  deepResearch: z.boolean().optional(),
});

/** POST /api/reports/:id/send-email */
export const SendEmailBody = z.object({
  emailTo: emailTo.min(1),
  attachPdf: z.boolean().optional(),
});

/** POST /api/tracked-stocks */
export const CreateTrackedStockBody = z.object({
  symbol: z
    .string()
    .trim()
    .min(1, "symbol is required")
    .max(16)
    .transform((value) => value.toUpperCase()),
  exchange: z
    .string()
    .trim()
    .max(16)
    .transform((value) => (value ? value.toUpperCase() : null))
    .nullable()
    .optional(),
  reportId: z.string().max(200).nullable().optional(),
  reportTitle: z.string().max(200).nullable().optional(),
  recommendationDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected a YYYY-MM-DD date"),
  recommendationPrice: z.number().positive(),
});

export type CreateScheduleBody = z.infer<typeof CreateScheduleBody>;
export type UpdateScheduleBody = z.infer<typeof UpdateScheduleBody>;
export type RunOnceBody = z.infer<typeof RunOnceBody>;
export type SendEmailBody = z.infer<typeof SendEmailBody>;
export type CreateTrackedStockBody = z.infer<typeof CreateTrackedStockBody>;

/** "field: message; field: message" for a 400 response. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}
