import { createTransport, type Transporter } from "nodemailer";
import type { EmailConfig } from "../config.js";
import type { Report } from "../reports/types.js";
import type { ReportArchive } from "../reports/archive.js";
import { reportContentPath, type ReportLinkSigner } from "../reports/links.js";
import type { DeliveryResult } from "./types.js";
import { escapeHtml } from "../util/html.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("email");

interface Attachment {
  filename: string;
  content: Buffer;
  contentType: string;
}

/** Report URL for recipients: signed when a signer is available, otherwise token-protected. */
export function reportLink(
  baseUrl: string,
  reportId: string,
  format: "md" | "html",
  links?: ReportLinkSigner,
): string {
  if (links) return links.url(baseUrl, reportId, format);
  return `${baseUrl.replace(/\/+$/, "")}${reportContentPath(reportId)}?format=${format}`;
}

export function buildEmailHtml(report: Report, baseUrl: string, links?: ReportLinkSigner): string {
  const title = escapeHtml(report.title);
  const parts = [
    `<h2>${title}</h2>`,
    "<p>Your scheduled research report is ready.</p>",
    "<ul>",
  ];
  if (report.blobPaths.html) {
    const url = escapeHtml(reportLink(baseUrl, report.id, "html", links));
    parts.push(`<li>HTML: <a href="${url}">${url}</a></li>`);
  }
  const md = escapeHtml(reportLink(baseUrl, report.id, "md", links));
  parts.push(`<li>Markdown: <a href="${md}">${md}</a></li>`);
  parts.push("</ul>");
  return parts.join("\n");
}

/**
 * Email delivery over SMTP. Never throws: every outcome, including
 * misconfiguration and transport failure, comes back as a DeliveryResult.
 */
export class SmtpEmailSender {
  private transporter: Transporter | null = null;

  constructor(
    private config: EmailConfig | undefined,
    private archive: ReportArchive,
    private links?: ReportLinkSigner,
  ) {
    if (config) {
      this.transporter = createTransport({
        host: config.host,
        port: config.port,
        secure: config.secure,
        auth: config.user ? { user: config.user, pass: config.pass ?? "" } : undefined,
      });
    }
  }

  async sendEmail(report: Report, recipients: string[], attachPdf: boolean): Promise<DeliveryResult> {
    const to = recipients.map((r) => r.trim()).filter((r) => r.length > 0);
    if (to.length === 0) {
      return { sent: false, reason: "no recipients" };
    }
    if (!this.config || !this.transporter) {
      return { sent: false, reason: "email service not configured" };
    }

    try {
      const attachments = attachPdf ? await this.loadAttachment(report) : [];
      const info = await this.transporter.sendMail({
        from: this.config.from,
        to,
        subject: `[Research] ${report.title}`,
        html: buildEmailHtml(report, this.config.appBaseUrl, this.links),
        attachments,
      });
      log.info({ reportId: report.id, recipients: to.length, messageId: info.messageId }, "report emailed");
      return { sent: true };
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      log.warn({ reportId: report.id, error: message }, "email delivery failed");
      return { sent: false, error: `SMTP send failed: ${message}` };
    }
  }

  /** The PDF document when one exists, otherwise the rendered HTML. */
  private async loadAttachment(report: Report): Promise<Attachment[]> {
    const { pdf, html } = report.blobPaths;
    if (pdf) {
      const content = await this.archive.read(pdf);
      if (content) return [{ filename: "report.pdf", content, contentType: "application/pdf" }];
    }
    if (html) {
      const content = await this.archive.read(html);
      if (content) return [{ filename: "report.html", content, contentType: "text/html" }];
    }
    return [];
  }
}
