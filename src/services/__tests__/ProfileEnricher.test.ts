import test from 'node:test';
import assert from 'node:assert/strict';

import { FakeRankingApi, TEST_API, timeoutFailure, transportFailure } from '../../__tests__/support/fakeRankingApi';
import { createSilentLogger } from '../../lib/logger';
import { ok } from '../../lib/result';
import EventApiClient from '../EventApiClient';
import ProfileEnricher from '../ProfileEnricher';
import type { LeaderboardEntry } from '../utils/leaderboard';

function createEnricher(api: FakeRankingApi, concurrency = 5): ProfileEnricher {
  return new ProfileEnricher({
    client: new EventApiClient({ http: api, api: TEST_API }),
    logger: createSilentLogger('ProfileEnricher'),
    concurrency,
  });
}

function listed(entityId: string, score: number, displayName: string | null = `Streamer ${entityId}`): LeaderboardEntry {
  return { entityId, displayName, rank: null, score, tier: null, page: 1, sequence: score };
}

test('enrich merges profile attributes into each entry', async () => {
  const api = new FakeRankingApi();

  const [entry] = await createEnricher(api).enrich([listed('12', 300)]);

  assert.deepEqual(entry, {
    entityId: '12',
    displayName: 'Streamer 12',
    rank: null,
    score: 300,
    tier: null,
    page: 1,
    sequence: 300,
    level: 12,
    tierLabel: 'B-2',
    followerCount: 120,
    streakDays: 3,
    isVerified: false,
    isTarget: false,
    profileStatus: 'ok',
  });
});

test('enrich isolates a failed lookup to its own entry', async () => {
  const api = new FakeRankingApi();
  api.profiles.set('5', transportFailure('profile-5'));
  const entries = Array.from({ length: 10 }, (_, index) => listed(String(index + 1), 100 - index));

  const enriched = await createEnricher(api).enrich(entries);

  assert.equal(enriched.length, 10);
  const failed = enriched[4];
  assert.equal(failed.entityId, '5');
  assert.equal(failed.displayName, 'Streamer 5');
  assert.equal(failed.profileStatus, 'transport');
  assert.deepEqual(
    [failed.level, failed.tierLabel, failed.followerCount, failed.streakDays, failed.isVerified],
    [null, null, null, null, null],
  );

  const others = enriched.filter((entry) => entry.entityId !== '5');
  assert.equal(others.length, 9);
  assert.ok(others.every((entry) => entry.profileStatus === 'ok' && entry.level !== null));
});

test('enrich keeps the input order and requests each profile once', async () => {
  const api = new FakeRankingApi();
  api.profileDelayMs = (roomId) => (roomId === '1' ? 15 : 1);
  const entries = [listed('1', 9), listed('2', 8), listed('3', 7)];

  const enriched = await createEnricher(api).enrich([...entries, entries[0]]);

  assert.deepEqual(
    enriched.map((entry) => entry.entityId),
    ['1', '2', '3', '1'],
  );
  assert.equal(api.callsTo(TEST_API.profilePath).length, 3);
});

test('enrich bounds concurrent profile requests', async () => {
  const api = new FakeRankingApi();
  api.profileDelayMs = () => 5;
  const entries = Array.from({ length: 10 }, (_, index) => listed(String(index + 1), 50 - index));

  await createEnricher(api, 3).enrich(entries);

  assert.equal(api.maxInFlightProfiles, 3);
  assert.equal(api.callsTo(TEST_API.profilePath).length, 10);
});

test('enrich falls back to the profile name, then to a placeholder', async () => {
  const api = new FakeRankingApi();
  api.profiles.set('8', timeoutFailure('profile-8'));

  const [fromProfile, placeholder] = await createEnricher(api).enrich([listed('7', 2, null), listed('8', 1, null)]);

  assert.equal(fromProfile.displayName, 'Profile 7');
  assert.equal(placeholder.displayName, 'Room 8');
  assert.equal(placeholder.profileStatus, 'timeout');
});

test('enrich marks a non-object profile body as malformed', async () => {
  const api = new FakeRankingApi();
  api.profiles.set('9', ok('maintenance'));

  const [entry] = await createEnricher(api).enrich([listed('9', 1)]);

  assert.equal(entry.profileStatus, 'malformed');
  assert.equal(entry.level, null);
});

test('enrich flags the target entry', async () => {
  const api = new FakeRankingApi();

  const enriched = await createEnricher(api).enrich([listed('1', 2), listed('2', 1)], '2');

  assert.deepEqual(
    enriched.map((entry) => entry.isTarget),
    [false, true],
  );
});

test('enrich makes no request for an empty selection', async () => {
  const api = new FakeRankingApi();

  assert.deepEqual(await createEnricher(api).enrich([]), []);
  assert.equal(api.calls.length, 0);
});
