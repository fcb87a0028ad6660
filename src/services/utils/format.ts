import type { AggregationResult } from '../RankingAggregator';
import type { EnrichedEntry } from '../ProfileEnricher';
import type { TargetStanding } from './leaderboard';

const UNAVAILABLE_LABEL = 'N/A';

const numberFormatter = new Intl.NumberFormat('en-US');

export function formatCount(value: number | null): string {
  return value === null ? UNAVAILABLE_LABEL : numberFormatter.format(value);
}

function formatFlag(value: boolean | null): string {
  if (value === null) {
    return UNAVAILABLE_LABEL;
  }
  return value ? 'yes' : 'no';
}

export function formatStandingSummary(standing: TargetStanding): string {
  const rank = standing.rank === null ? UNAVAILABLE_LABEL : String(standing.rank);
  const level = standing.tier === null ? UNAVAILABLE_LABEL : String(standing.tier);
  return `Rank ${rank} / Score ${formatCount(standing.score)} / Level ${level}`;
}

const COLUMNS: ReadonlyArray<{ header: string; cell: (entry: EnrichedEntry) => string }> = [
  { header: 'Rank', cell: (entry) => (entry.rank === null ? UNAVAILABLE_LABEL : String(entry.rank)) },
  { header: 'Room', cell: (entry) => entry.displayName },
  { header: 'Score', cell: (entry) => formatCount(entry.score) },
  { header: 'Quest', cell: (entry) => (entry.tier === null ? UNAVAILABLE_LABEL : String(entry.tier)) },
  { header: 'Level', cell: (entry) => formatCount(entry.level) },
  { header: 'Tier', cell: (entry) => entry.tierLabel ?? UNAVAILABLE_LABEL },
  { header: 'Followers', cell: (entry) => formatCount(entry.followerCount) },
  { header: 'Streak', cell: (entry) => formatCount(entry.streakDays) },
  { header: 'Official', cell: (entry) => formatFlag(entry.isVerified) },
];

export function formatRankingTable(result: AggregationResult): string {
  const title = `Event ${result.eventId ?? UNAVAILABLE_LABEL}: ${formatCount(result.totalParticipantCount)} participants`;
  if (result.topEntries.length === 0) {
    return `${title}\n(no entries)`;
  }

  const rows = result.topEntries.map((entry) => ({
    marker: entry.isTarget ? '>' : ' ',
    cells: COLUMNS.map((column) => column.cell(entry)),
  }));
  const widths = COLUMNS.map((column, index) =>
    Math.max(column.header.length, ...rows.map((row) => row.cells[index].length)),
  );

  const renderLine = (marker: string, cells: readonly string[]): string =>
    `${marker} ${cells.map((cell, index) => cell.padEnd(widths[index])).join('  ')}`.trimEnd();

  const lines = [
    title,
    renderLine(' ', COLUMNS.map((column) => column.header)),
    ...rows.map((row) => renderLine(row.marker, row.cells)),
  ];
  return lines.join('\n');
}
