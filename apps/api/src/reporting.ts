import type { IngestIssue } from './types/table';

/** Sink for sources that were skipped or failed during a run. */
export interface ErrorChannel {
  report(issue: IngestIssue): void;
}

export const consoleChannel: ErrorChannel = {
  report: issue => {
    console.warn(`[ingest] ${issue.source} (${issue.kind}): ${issue.message}`);
  }
};

export type CollectingChannel = ErrorChannel & { readonly issues: IngestIssue[] };

export const createCollectingChannel = (forward?: ErrorChannel): CollectingChannel => {
  const issues: IngestIssue[] = [];
  return {
    issues,
    report: issue => {
      issues.push(issue);
      forward?.report(issue);
    }
  };
};
