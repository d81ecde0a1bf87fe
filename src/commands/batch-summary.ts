import type { BatchRecord, BatchStatus } from '../types/batch.types.js';

export interface FailureLine {
  rowIndex: number;
  to: string[];
  kind: string;
  reason: string;
}

export interface BatchSummary {
  batchId: string;
  status: BatchStatus;
  profile: string;
  total: number;
  attempted: number;
  sent: number;
  failed: number;
  createdAt: string;
  finishedAt: string;
  abortedAt?: { rowIndex: number; reason: string };
  failures: FailureLine[];
}

export function summarizeBatch(record: BatchRecord): BatchSummary {
  const failures = record.outcomes
    .filter(outcome => outcome.status === 'failed')
    .map(outcome => ({
      rowIndex: outcome.rowIndex,
      to: [...outcome.to],
      kind: outcome.error?.kind ?? 'send',
      reason: outcome.error?.message ?? 'unknown error',
    }));

  const summary: BatchSummary = {
    batchId: record.batchId,
    status: record.status,
    profile: record.profile,
    total: record.totalCount,
    attempted: record.outcomes.length,
    sent: record.outcomes.length - failures.length,
    failed: failures.length,
    createdAt: record.createdAt,
    finishedAt: record.finishedAt,
    failures,
  };

  const last = failures[failures.length - 1];
  if (record.status === 'aborted' && last) {
    summary.abortedAt = { rowIndex: last.rowIndex, reason: last.reason };
  }

  return summary;
}

export function formatSummary(summary: BatchSummary): string[] {
  const lines = [
    `batch_id: ${summary.batchId}`,
    `status: ${summary.status}`,
    `profile: ${summary.profile}`,
    `sent: ${summary.sent} failed: ${summary.failed} attempted: ${summary.attempted} total: ${summary.total}`,
  ];

  if (summary.abortedAt) {
    lines.push(`aborted at row ${summary.abortedAt.rowIndex}: ${summary.abortedAt.reason}`);
  }

  for (const failure of summary.failures) {
    const recipients = failure.to.length > 0 ? failure.to.join(', ') : '-';
    lines.push(`  row ${failure.rowIndex} (${recipients}) [${failure.kind}]: ${failure.reason}`);
  }

  return lines;
}

/**
 * One line per failed outcome, for the --error-log file.
 */
export function formatErrorLog(record: BatchRecord): string {
  return record.outcomes
    .filter(outcome => outcome.status === 'failed')
    .map(outcome => `batch=${record.batchId} row=${outcome.rowIndex} to=${outcome.to.join(';')} error=${outcome.error?.message ?? 'unknown error'}\n`)
    .join('');
}
