import type { FailedKey, ResolutionReport } from './types.js';

function describeFailure(failed: FailedKey): string {
  const tried = failed.attempts.map(a => `${a.provider}: ${a.reason}`).join(', ');
  return tried
    ? `  ${failed.key} (${failed.reason}; tried ${tried})`
    : `  ${failed.key} (${failed.reason})`;
}

/** Human-readable run summary, one line per item. Empty sections are left out. */
export function formatReport(report: ResolutionReport): string {
  const lines: string[] = [];

  for (const warning of report.warnings) {
    lines.push(`Warning: ${warning}`);
  }

  if (report.accepted.length > 0) {
    lines.push(`Added ${report.accepted.length} entr${report.accepted.length === 1 ? 'y' : 'ies'}:`);
    for (const accepted of report.accepted) {
      lines.push(`  ${accepted.key} [${accepted.via ?? accepted.provider}]`);
    }
  }

  if (report.stubs.length > 0) {
    lines.push(`Added ${report.stubs.length} arXiv crossref stub(s):`);
    for (const stub of report.stubs) {
      lines.push(`  ${stub.stubKey} -> ${stub.targetKey}`);
    }
  }

  if (report.existing.length > 0) {
    lines.push(`${report.existing.length} key(s) already in the bibliography, skipped`);
  }

  if (report.duplicatesSkipped.length > 0) {
    lines.push(`${report.duplicatesSkipped.length} key(s) skipped — they refer to the same paper as an earlier key:`);
    for (const dup of report.duplicatesSkipped) {
      const source = dup.winningSourceKey !== dup.winningKey ? ` (source key ${dup.winningSourceKey})` : '';
      lines.push(`  ${dup.duplicateKey} -> ${dup.winningKey}${source}, same ${dup.matchedOn}`);
    }
  }

  if (report.failedKeys.length > 0) {
    lines.push(`Could not resolve ${report.failedKeys.length} key(s):`);
    lines.push(...report.failedKeys.map(describeFailure));
  }

  return lines.join('\n');
}

/** 1 when any key was left unresolved. */
export function exitCodeFor(report: ResolutionReport): number {
  return report.failedKeys.length > 0 ? 1 : 0;
}

export function rateLimitedKeys(report: ResolutionReport): string[] {
  return report.failedKeys
    .filter(failed => failed.attempts.some(a => a.reason === 'rate-limited'))
    .map(failed => failed.key);
}

/** Longest Retry-After any provider asked for, rounded up to whole seconds. */
export function retryAfterSeconds(report: ResolutionReport): number | undefined {
  let longest: number | undefined;
  for (const failed of report.failedKeys) {
    for (const attempt of failed.attempts) {
      if (attempt.reason === 'rate-limited' && attempt.retryAfterMs !== undefined) {
        longest = Math.max(longest ?? 0, attempt.retryAfterMs);
      }
    }
  }
  return longest === undefined ? undefined : Math.ceil(longest / 1000);
}
