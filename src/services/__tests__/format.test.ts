import test from 'node:test';
import assert from 'node:assert/strict';

import type { AggregationResult } from '../RankingAggregator';
import { formatCount, formatRankingTable, formatStandingSummary } from '../utils/format';

function aggregation(overrides: Partial<AggregationResult> = {}): AggregationResult {
  return {
    eventId: '42',
    limit: 10,
    totalParticipantCount: 1500,
    targetStanding: { entityId: null, found: false, rank: null, score: null, tier: null },
    topEntries: [],
    listing: {
      pagesFetched: 1,
      entriesRetrieved: 0,
      uniqueEntries: 0,
      duplicatesDropped: 0,
      invalidEntriesDropped: 0,
      stopReason: 'empty-page',
    },
    ...overrides,
  };
}

test('formatCount groups thousands and labels missing values', () => {
  assert.equal(formatCount(1234567), '1,234,567');
  assert.equal(formatCount(0), '0');
  assert.equal(formatCount(null), 'N/A');
});

test('formatStandingSummary prints rank, score and level', () => {
  assert.equal(
    formatStandingSummary({ entityId: '40', found: true, rank: 3, score: 1234, tier: 5 }),
    'Rank 3 / Score 1,234 / Level 5',
  );
  assert.equal(
    formatStandingSummary({ entityId: '40', found: false, rank: null, score: null, tier: null }),
    'Rank N/A / Score N/A / Level N/A',
  );
});

test('formatRankingTable notes an empty ranking', () => {
  assert.equal(formatRankingTable(aggregation()), 'Event 42: 1,500 participants\n(no entries)');
});

test('formatRankingTable aligns columns and marks the target row', () => {
  const table = formatRankingTable(
    aggregation({
      topEntries: [
        {
          entityId: '7',
          displayName: 'A',
          rank: 1,
          score: 1234,
          tier: 2,
          page: 1,
          sequence: 0,
          level: 5,
          tierLabel: 'B-2',
          followerCount: 10,
          streakDays: 3,
          isVerified: true,
          isTarget: true,
          profileStatus: 'ok',
        },
      ],
    }),
  );

  assert.equal(
    table,
    [
      'Event 42: 1,500 participants',
      '  Rank  Room  Score  Quest  Level  Tier  Followers  Streak  Official',
      '> 1     A     1,234  2      5      B-2   10         3       yes',
    ].join('\n'),
  );
});
