import { randomUUID } from "node:crypto";
import type { ScheduleStore } from "./store.js";
import type { Schedule, UpdateScheduleInput } from "./types.js";
import { computeNextRun, parseRecurrenceRule } from "../recurrence/calculator.js";
import type { RecurrenceRule } from "../recurrence/types.js";

/** A schedule request the caller got wrong (as opposed to a store failure). */
export class ScheduleValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScheduleValidationError";
  }
}

/** Fields a caller may set on a schedule. `recurrence` is validated here. */
export interface ScheduleFields {
  title?: string | null;
  prompt?: string;
  symbols?: string[];
  recurrence?: unknown;
  emailTo?: string[];
  attachPdf?: boolean;
  deepResearch?: boolean;
  active?: boolean;
}

/** Trim, upper-case and de-duplicate ticker symbols, keeping their order. */
export function normalizeSymbols(symbols: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of symbols) {
    const symbol = raw.trim().toUpperCase();
    if (!symbol || seen.has(symbol)) continue;
    seen.add(symbol);
    result.push(symbol);
  }
  return result;
}

export function normalizeRecipients(recipients: string[]): string[] {
  return recipients.map((r) => r.trim()).filter((r) => r.length > 0);
}

export function requireSubject(prompt: string, symbols: string[]): void {
  if (!prompt && symbols.length === 0) {
    throw new ScheduleValidationError("A research request needs a prompt or at least one symbol");
  }
}

/**
 * Schedule create/update rules on top of the store: input normalization and
 * `nextRunAt` maintenance. `nextRunAt` is computed from the request time and
 * cleared whenever the schedule is inactive.
 */
export class ScheduleService {
  constructor(
    private store: ScheduleStore,
    private now: () => Date = () => new Date(),
    private newId: () => string = randomUUID,
  ) {}

  create(ownerId: string, fields: ScheduleFields): Schedule {
    if (fields.recurrence === undefined) {
      throw new ScheduleValidationError("A schedule needs a recurrence rule");
    }
    const recurrence = parseRecurrenceRule(fields.recurrence);
    const prompt = fields.prompt?.trim() ?? "";
    const symbols = normalizeSymbols(fields.symbols ?? []);
    requireSubject(prompt, symbols);

    const now = this.now();
    const active = fields.active !== false;

    return this.store.create(
      {
        id: this.newId(),
        ownerId,
        title: fields.title?.trim() || null,
        prompt,
        symbols,
        recurrence,
        email: {
          to: normalizeRecipients(fields.emailTo ?? []),
          attachPdf: fields.attachPdf ?? false,
        },
        deepResearch: fields.deepResearch ?? false,
        active,
        nextRunAt: active ? computeNextRun(recurrence, now).toISOString() : null,
      },
      now,
    );
  }

  update(id: string, ownerId: string, fields: ScheduleFields): Schedule | undefined {
    const existing = this.store.get(id, ownerId);
    if (!existing) return undefined;

    const patch: UpdateScheduleInput = {};
    let recurrence: RecurrenceRule = existing.recurrence;

    if (fields.recurrence !== undefined) {
      recurrence = parseRecurrenceRule(fields.recurrence);
      patch.recurrence = recurrence;
    }
    if (fields.title !== undefined) {
      patch.title = fields.title?.trim() || null;
    }
    if (fields.prompt !== undefined) {
      patch.prompt = fields.prompt.trim();
    }
    if (fields.symbols !== undefined) {
      patch.symbols = normalizeSymbols(fields.symbols);
    }
    requireSubject(patch.prompt ?? existing.prompt, patch.symbols ?? existing.symbols);

    if (fields.emailTo !== undefined || fields.attachPdf !== undefined) {
      patch.email = {
        to: fields.emailTo !== undefined ? normalizeRecipients(fields.emailTo) : existing.email.to,
        attachPdf: fields.attachPdf ?? existing.email.attachPdf,
      };
    }
    if (fields.deepResearch !== undefined) {
      patch.deepResearch = fields.deepResearch;
    }

    const now = this.now();
    const active = fields.active ?? existing.active;
    if (fields.active !== undefined) {
      patch.active = fields.active;
    }

    if (!active) {
      patch.nextRunAt = null;
    } else if (patch.recurrence !== undefined || !existing.active || existing.nextRunAt === null) {
      patch.nextRunAt = computeNextRun(recurrence, now).toISOString();
    }

    return this.store.update(id, patch, { ownerId, now });
  }
}
