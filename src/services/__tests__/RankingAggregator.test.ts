import test from 'node:test';
import assert from 'node:assert/strict';

import {
  createRankingPipeline,
  FakeRankingApi,
  listingPages,
  roomEntry,
  seedEvent,
  TEST_API,
  transportFailure,
} from '../../__tests__/support/fakeRankingApi';
import { ok } from '../../lib/result';

test('aggregate returns the top entries by score across all pages', async () => {
  const api = new FakeRankingApi();
  seedEvent(api, '42', 72);

  const result = await createRankingPipeline(api).aggregate({ eventId: '42', limit: 10 });

  assert.equal(result.eventId, '42');
  assert.equal(result.limit, 10);
  assert.equal(result.totalParticipantCount, 72);
  assert.deepEqual(
    result.topEntries.map((entry) => entry.score),
    [1000, 999, 998, 997, 996, 995, 994, 993, 992, 991],
  );
  assert.deepEqual(result.listing, {
    pagesFetched: 3,
    entriesRetrieved: 72,
    uniqueEntries: 72,
    duplicatesDropped: 0,
    invalidEntriesDropped: 0,
    stopReason: 'short-page',
  });
  assert.equal(api.callsTo(TEST_API.profilePath).length, 10);
});

test('aggregate counts a room listed twice under different id forms once, at its best score', async () => {
  const api = new FakeRankingApi();
  api.listings.set('7', [ok({ list: [roomEntry('55', 10), roomEntry(55, 20), roomEntry(3, 15)] })]);

  const result = await createRankingPipeline(api).aggregate({ eventId: '7' });

  assert.deepEqual(
    result.topEntries.map((entry) => [entry.entityId, entry.score]),
    [
      ['55', 20],
      ['3', 15],
    ],
  );
  assert.equal(result.listing.duplicatesDropped, 1);
  assert.equal(result.listing.uniqueEntries, 2);
});

test('aggregate survives a failed profile lookup', async () => {
  const api = new FakeRankingApi();
  seedEvent(api, '42', 72);
  api.profiles.set('4', transportFailure('profile-4'));

  const result = await createRankingPipeline(api).aggregate({ eventId: '42' });

  assert.equal(result.topEntries.length, 10);
  const failed = result.topEntries.filter((entry) => entry.profileStatus !== 'ok');
  assert.deepEqual(
    failed.map((entry) => [entry.entityId, entry.level, entry.followerCount, entry.isVerified]),
    [['4', null, null, null]],
  );
  assert.equal(
    result.topEntries.filter((entry) => entry.level !== null).length,
    9,
  );
});

test('aggregate makes no upstream call without an event id', async () => {
  const api = new FakeRankingApi();

  const result = await createRankingPipeline(api).aggregate({ eventId: '  ', targetId: '12' });

  assert.equal(api.calls.length, 0);
  assert.deepEqual(result, {
    eventId: null,
    limit: 10,
    totalParticipantCount: null,
    targetStanding: { entityId: '12', found: false, rank: null, score: null, tier: null },
    topEntries: [],
    listing: {
      pagesFetched: 0,
      entriesRetrieved: 0,
      uniqueEntries: 0,
      duplicatesDropped: 0,
      invalidEntriesDropped: 0,
      stopReason: 'no-event',
    },
  });
});

test('aggregate appends a target ranked outside the top entries once', async () => {
  const api = new FakeRankingApi();
  seedEvent(api, '42', 72);

  const result = await createRankingPipeline(api).aggregate({ eventId: '42', targetId: '40.0', limit: 5 });

  assert.deepEqual(result.targetStanding, { entityId: '40', found: true, rank: 40, score: 961, tier: 5 });
  assert.deepEqual(
    result.topEntries.map((entry) => entry.entityId),
    ['1', '2', '3', '4', '5', '40'],
  );
  assert.deepEqual(
    result.topEntries.filter((entry) => entry.isTarget).map((entry) => entry.entityId),
    ['40'],
  );
});

test('aggregate does not duplicate a target already in the top entries', async () => {
  const api = new FakeRankingApi();
  seedEvent(api, '42', 72);

  const result = await createRankingPipeline(api).aggregate({ eventId: '42', targetId: 3, limit: 5 });

  assert.equal(result.topEntries.length, 5);
  assert.equal(result.topEntries[2].isTarget, true);
  assert.equal(result.targetStanding.rank, 3);
});

test('aggregate reports an absent target without adding a row', async () => {
  const api = new FakeRankingApi();
  seedEvent(api, '42', 72);

  const result = await createRankingPipeline(api).aggregate({ eventId: '42', targetId: '9999' });

  assert.equal(result.topEntries.length, 10);
  assert.ok(result.topEntries.every((entry) => !entry.isTarget));
  assert.deepEqual(result.targetStanding, { entityId: '9999', found: false, rank: null, score: null, tier: null });
});

test('aggregate clamps the requested limit', async () => {
  const api = new FakeRankingApi();
  seedEvent(api, '42', 72);
  const aggregator = createRankingPipeline(api, { maxLimit: 50 });

  const clamped = await aggregator.aggregate({ eventId: '42', limit: 500 });
  assert.equal(clamped.limit, 50);
  assert.equal(clamped.topEntries.length, 50);

  const fallback = await aggregator.aggregate({ eventId: '42', limit: 'many' });
  assert.equal(fallback.limit, 10);
});

test('aggregate ranks the entries gathered before a pagination failure', async () => {
  const api = new FakeRankingApi();
  const rooms = Array.from({ length: 30 }, (_, index) => roomEntry(index + 1, index));
  api.listings.set('42', [...listingPages(rooms), transportFailure('page-2')]);

  const result = await createRankingPipeline(api).aggregate({ eventId: '42', limit: 3 });

  assert.equal(result.listing.stopReason, 'error');
  assert.equal(result.totalParticipantCount, 0);
  assert.deepEqual(
    result.topEntries.map((entry) => entry.score),
    [29, 28, 27],
  );
});

test('aggregate returns an empty ranking for an unknown event', async () => {
  const api = new FakeRankingApi();

  const result = await createRankingPipeline(api).aggregate({ eventId: 'missing', targetId: '1' });

  assert.equal(result.eventId, 'missing');
  assert.equal(result.topEntries.length, 0);
  assert.equal(result.listing.stopReason, 'not-found');
  assert.equal(result.targetStanding.found, false);
  assert.equal(api.callsTo(TEST_API.profilePath).length, 0);
});
