/**
 * Next-run computation for schedule recurrence rules.
 *
 * All arithmetic is UTC. Every function here is pure: the caller passes the
 * reference time, nothing reads the clock.
 */

import {
  RecurrenceRuleSchema,
  InvalidRecurrenceRuleError,
  type RecurrenceRule,
} from "./types.js";

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;
const WEEK_MS = 7 * DAY_MS;

const WEEKDAY_NAMES = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"];

/** Validate an untrusted value (request body, DB column) as a recurrence rule. */
export function parseRecurrenceRule(input: unknown): RecurrenceRule {
  const result = RecurrenceRuleSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidRecurrenceRuleError(
      result.error.issues.map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
    );
  }
  return result.data;
}

/** Monday-based weekday (0 = Monday … 6 = Sunday) of a UTC instant. */
function utcWeekday(date: Date): number {
  return (date.getUTCDay() + 6) % 7;
}

/** The UTC calendar day of `date` at hour:minute. */
function atTimeOfDay(date: Date, hour: number, minute: number): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate(), hour, minute);
}

/**
 * Next due instant for `rule`, strictly after `from`.
 *
 * - hourly: slots are `minute` past every `interval`-th hour counted from the Unix epoch.
 * - daily: `from`'s day at hour:minute, pushed `interval` days out when already passed.
 * - weekly: the next `weekday` at hour:minute, pushed `interval` weeks out when already passed.
 *
 * Throws InvalidRecurrenceRuleError when the rule is malformed.
 */
export function computeNextRun(rule: RecurrenceRule, from: Date): Date {
  const valid = parseRecurrenceRule(rule);
  const fromMs = from.getTime();

  switch (valid.cadence) {
    case "hourly": {
      const period = valid.interval * HOUR_MS;
      const offset = valid.minute * MINUTE_MS;
      const slot = Math.floor((fromMs - offset) / period) + 1;
      return new Date(slot * period + offset);
    }

    case "daily": {
      let candidate = atTimeOfDay(from, valid.hour, valid.minute);
      if (candidate <= fromMs) {
        candidate += valid.interval * DAY_MS;
      }
      return new Date(candidate);
    }

    case "weekly": {
      const daysAhead = (valid.weekday - utcWeekday(from) + 7) % 7;
      let candidate = atTimeOfDay(from, valid.hour, valid.minute) + daysAhead * DAY_MS;
      if (candidate <= fromMs) {
        candidate += valid.interval * WEEK_MS;
      }
      return new Date(candidate);
    }
  }
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Short human description, e.g. "every 2 days at 09:30 UTC". */
export function describeRecurrence(rule: RecurrenceRule): string {
  const every = (unit: string) =>
    rule.interval === 1 ? `every ${unit}` : `every ${rule.interval} ${unit}s`;

  switch (rule.cadence) {
    case "hourly":
      return `${every("hour")} at :${pad(rule.minute)}`;
    case "daily":
      return `${every("day")} at ${pad(rule.hour)}:${pad(rule.minute)} UTC`;
    case "weekly":
      return `${every("week")} on ${WEEKDAY_NAMES[rule.weekday]} at ${pad(rule.hour)}:${pad(rule.minute)} UTC`;
  }
}
