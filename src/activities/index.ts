import type { ResearchConfig } from "../config.js";
import type { ReportArchive } from "../reports/archive.js";
import type { ReportStore } from "../reports/store.js";
import type { Activities } from "./types.js";
import { WebSearchProvider } from "./search.js";
import { OpenAISynthesizer } from "./synthesize.js";
import { ReportSaver } from "./report-saver.js";
import { SmtpEmailSender } from "./email.js";
import { ReportLinkSigner } from "../reports/links.js";

export interface ActivityDeps {
  archive: ReportArchive;
  reports: ReportStore;
}

/** Wire the production adapters behind the Activities contract. */
export function createActivities(config: ResearchConfig, deps: ActivityDeps): Activities {
  const search = new WebSearchProvider(config.search);
  const synthesizer = new OpenAISynthesizer(config.llm);
  const saver = new ReportSaver(deps.archive, deps.reports);
  // Links are verified by the API server, so they are only signed when it is configured.
  const links = config.server ? new ReportLinkSigner(config.server.token) : undefined;
  const email = new SmtpEmailSender(config.email, deps.archive, links);

  return {
    fetchContext: (query, symbols, signal) => search.fetchContext(query, symbols, signal),
    synthesizeReport: (context, request, signal) => synthesizer.synthesizeReport(context, request, signal),
    saveReport: (draft, target, signal) => saver.saveReport(draft, target, signal),
    sendEmail: (report, recipients, attachPdf) => email.sendEmail(report, recipients, attachPdf),
  };
}
