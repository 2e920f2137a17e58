import { z } from "zod";

const interval = z.number().int().min(1).default(1);
const minute = z.number().int().min(0).max(59);
const hour = z.number().int().min(0).max(23);
/** 0 = Monday … 6 = Sunday */
const weekday = z.number().int().min(0).max(6);

export const HourlyRuleSchema = z.object({
  cadence: z.literal("hourly"),
  interval,
  minute,
});

export const DailyRuleSchema = z.object({
  cadence: z.literal("daily"),
  interval,
  hour,
  minute,
});

export const WeeklyRuleSchema = z.object({
  cadence: z.literal("weekly"),
  interval,
  weekday,
  hour,
  minute,
});

export const RecurrenceRuleSchema = z.discriminatedUnion("cadence", [
  HourlyRuleSchema,
  DailyRuleSchema,
  WeeklyRuleSchema,
]);

export type HourlyRule = z.infer<typeof HourlyRuleSchema>;
export type DailyRule = z.infer<typeof DailyRuleSchema>;
export type WeeklyRule = z.infer<typeof WeeklyRuleSchema>;
export type RecurrenceRule = z.infer<typeof RecurrenceRuleSchema>;
export type Cadence = RecurrenceRule["cadence"];

/** A schedule's recurrence is missing a field for its cadence or holds an out-of-range value. */
export class InvalidRecurrenceRuleError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid recurrence rule: ${issues.join("; ")}`);
    this.name = "InvalidRecurrenceRuleError";
  }
}
