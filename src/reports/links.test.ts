import { describe, it, expect } from "vitest";
import { ReportLinkSigner, LINK_TTL_MS, reportContentPath } from "./links.js";

const NOW = new Date("2026-03-02T09:00:00.000Z");
const EXPIRES = "1772614800";

function signer(now: Date = NOW): ReportLinkSigner {
  return new ReportLinkSigner("test-secret", LINK_TTL_MS, () => now);
}

describe("reportContentPath", () => {
  it("encodes the report id", () => {
    expect(reportContentPath("report a/b")).toBe("/api/reports/report%20a%2Fb/content");
  });
});

describe("ReportLinkSigner", () => {
  it("builds a link that expires 48 hours out", () => {
    const url = new URL(signer().url("http://host/", "report-run-1", "html"));

    expect(url.origin + url.pathname).toBe("http://host/api/reports/report-run-1/content");
    expect(url.searchParams.get("format")).toBe("html");
    expect(url.searchParams.get("expires")).toBe(EXPIRES);
    expect(url.searchParams.get("sig")).toBe(signer().sign("report-run-1", "html", Number(EXPIRES)));
  });

  it("accepts its own signature before expiry", () => {
    const sig = signer().sign("report-run-1", "html", Number(EXPIRES));
    expect(signer().verify("report-run-1", "html", EXPIRES, sig)).toBe(true);
  });

  it("rejects an expired link", () => {
    const sig = signer().sign("report-run-1", "html", Number(EXPIRES));
    const later = new Date(NOW.getTime() + LINK_TTL_MS);
    expect(signer(later).verify("report-run-1", "html", EXPIRES, sig)).toBe(false);
  });

  it("rejects a signature for another report, format or secret", () => {
    const sig = signer().sign("report-run-1", "html", Number(EXPIRES));
    expect(signer().verify("report-run-2", "html", EXPIRES, sig)).toBe(false);
    expect(signer().verify("report-run-1", "md", EXPIRES, sig)).toBe(false);

    const other = new ReportLinkSigner("other-secret", LINK_TTL_MS, () => NOW);
    expect(other.verify("report-run-1", "html", EXPIRES, sig)).toBe(false);
  });

  it("rejects missing or malformed parameters", () => {
    const sig = signer().sign("report-run-1", "html", Number(EXPIRES));
    expect(signer().verify("report-run-1", "html", null, sig)).toBe(false);
    expect(signer().verify("report-run-1", "html", EXPIRES, null)).toBe(false);
    expect(signer().verify("report-run-1", "html", "soon", sig)).toBe(false);
    expect(signer().verify("report-run-1", "html", EXPIRES, "abc")).toBe(false);
  });
});
