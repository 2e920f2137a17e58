import { createHmac, timingSafeEqual } from "node:crypto";
import type { ReportFormat } from "./types.js";

/** Emailed report links stay valid for 48 hours. */
export const LINK_TTL_MS = 48 * 3_600_000;

export function reportContentPath(reportId: string): string {
  return `/api/reports/${encodeURIComponent(reportId)}/content`;
}

/**
 * Signs report content URLs so a recipient can open a report without the API
 * token. The signature covers the report id, the format and the expiry.
 */
export class ReportLinkSigner {
  constructor(
    private secret: string,
    private ttlMs: number = LINK_TTL_MS,
    private now: () => Date = () => new Date(),
  ) {}

  sign(reportId: string, format: ReportFormat, expires: number): string {
    return createHmac("sha256", this.secret).update(`${reportId}\n${format}\n${expires}`).digest("hex");
  }

  /** Absolute signed URL for `baseUrl`; `expires` is in Unix seconds. */
  url(baseUrl: string, reportId: string, format: ReportFormat): string {
    const expires = Math.floor((this.now().getTime() + this.ttlMs) / 1000);
    const query = new URLSearchParams({
      format,
      expires: String(expires),
      sig: this.sign(reportId, format, expires),
    });
    return `${baseUrl.replace(/\/+$/, "")}${reportContentPath(reportId)}?${query.toString()}`;
  }

  verify(reportId: string, format: ReportFormat, expires: string | null, sig: string | null): boolean {
    if (!expires || !sig || !/^\d+$/.test(expires)) return false;
    const expiresAt = Number(expires);
    if (expiresAt * 1000 <= this.now().getTime()) return false;

    const expected = Buffer.from(this.sign(reportId, format, expiresAt), "hex");
    const given = Buffer.from(sig, "hex");
    return given.length === expected.length && timingSafeEqual(given, expected);
  }
}
