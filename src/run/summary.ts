import type { RankedOpportunity, ScreenRunResult } from '@/types/opportunity';

const RULE = '='.repeat(50);

function countLine(label: string, value: number): string {
  return `${`${label}:`.padEnd(22)}${value}`;
}

export function formatOpportunityRow(opp: RankedOpportunity): string {
  const range = opp.volatility
    ? `${opp.volatility.forecast.expectedRange.lower.toFixed(2)}-${opp.volatility.forecast.expectedRange.upper.toFixed(2)}`
    : 'n/a';
  return [
    `${opp.rank}.`.padStart(4),
    opp.id.padEnd(8),
    opp.sector.padEnd(24),
    opp.scores.composite.toFixed(2).padStart(6),
    opp.scores.grade.padEnd(3),
    opp.riskCategory.padEnd(13),
    `${opp.positionSizePct.toFixed(2)}%`.padStart(7),
    range,
  ].join(' ');
}

/** Terminal summary: every count first, so dropped instruments are always visible. */
export function formatRunSummary(result: ScreenRunResult): string[] {
  const { counts, allocation } = result;
  const lines = [
    RULE,
    'WEEKLY SCREEN COMPLETE',
    RULE,
    countLine('Received', counts.received),
    countLine('Intake rejected', counts.intakeRejected),
    countLine('Truncated', counts.truncated),
    countLine('Processed', counts.processed),
    countLine('Eligible', counts.eligible),
    countLine('Rejected by gate', counts.rejected),
    countLine('Forecast failed', counts.forecastFailed),
    countLine('  invalid series', counts.invalidSeries),
    countLine('  short history', counts.insufficientHistory),
    countLine('Below minimum score', counts.belowMinimum),
    countLine('Not selected', counts.notSelected),
    countLine('Shortlisted', counts.shortlisted),
    `${'Total exposure:'.padEnd(22)}${allocation.totalPct.toFixed(2)}%`,
  ];

  if (result.opportunities.length > 0) {
    lines.push('', 'Shortlist:');
    lines.push(...result.opportunities.map(formatOpportunityRow));
  }

  lines.push(`${'Result hash:'.padEnd(22)}${result.resultHash}`, RULE);
  return lines;
}
