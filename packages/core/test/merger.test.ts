import assert from 'node:assert/strict';
import test from 'node:test';

import { toCitationKey } from '../src/classify.js';
import { EntryMerger } from '../src/merger.js';
import type { ResolveResult } from '../src/types.js';

type Succeeded = Extract<ResolveResult, { status: 'succeeded' }>;

function succeeded(raw: string, naturalKey: string, rawEntry: string, eprint?: string): Succeeded {
  const citationKey = toCitationKey(raw);
  const arxiv = citationKey.format === 'arxiv-new' || citationKey.format === 'arxiv-old';
  return {
    status: 'succeeded',
    entry: { citationKey, provider: 'inspire', rawEntry, naturalKey, eprint },
    finalKey: arxiv ? naturalKey : raw,
    stub: arxiv && naturalKey !== raw ? { stubKey: raw, targetKey: naturalKey } : undefined,
    attempts: []
  };
}

test('accepted entries are rewritten to the final key', () => {
  const merger = new EntryMerger(new Map());
  const disposition = merger.merge(succeeded('2016PhRvL.116f1102A', 'LIGOScientific:2016aoc', '@article{LIGOScientific:2016aoc,\n  title = {T}\n}'));

  assert.deepEqual(disposition, {
    kind: 'accepted',
    key: '2016PhRvL.116f1102A',
    entry: '@article{2016PhRvL.116f1102A,\n  title = {T}\n}',
    stub: undefined
  });
  assert.deepEqual([...merger.entries().keys()], ['2016PhRvL.116f1102A']);
});

test('arXiv keys add the full entry and a crossref stub', () => {
  const merger = new EntryMerger(new Map());
  const disposition = merger.merge(succeeded('1602.03837', 'LIGOScientific:2016aoc', '@article{LIGOScientific:2016aoc,\n  title = {T}\n}'));

  assert.equal(disposition.kind, 'accepted');
  assert.deepEqual(disposition.kind === 'accepted' && disposition.stub, {
    key: '1602.03837',
    entry: '@misc{1602.03837,\n  crossref = {LIGOScientific:2016aoc}\n}'
  });
  assert.deepEqual([...merger.entries().keys()], ['LIGOScientific:2016aoc', '1602.03837']);
});

test('entries already in the output are kept, while a missing stub is still written', () => {
  const existing = new Map([['LIGOScientific:2016aoc', '@article{LIGOScientific:2016aoc,\n  title = {Kept}\n}']]);
  const merger = new EntryMerger(existing);

  assert.equal(merger.contains('LIGOScientific:2016aoc'), true);
  const disposition = merger.merge(succeeded('1602.03837', 'LIGOScientific:2016aoc', '@article{LIGOScientific:2016aoc,\n  title = {New}\n}'));

  assert.equal(disposition.kind, 'skipped-existing');
  assert.equal(disposition.kind === 'skipped-existing' && disposition.stub?.key, '1602.03837');
  assert.equal(merger.entries().get('LIGOScientific:2016aoc'), '@article{LIGOScientific:2016aoc,\n  title = {Kept}\n}');
});

test('a second key for the same paper is skipped without a stub', () => {
  const merger = new EntryMerger(new Map());
  merger.merge(succeeded('Smith:2020ab', 'Smith:2020ab', '@article{Smith:2020ab,\n}', '2001.00001'));

  const disposition = merger.merge(succeeded('2001.00001', 'Smith:2020ab', '@article{Smith:2020ab,\n}', '2001.00001'));
  assert.deepEqual(disposition, {
    kind: 'skipped-duplicate',
    key: '2001.00001',
    winningKey: 'Smith:2020ab',
    winningSourceKey: 'Smith:2020ab',
    matchedOn: 'naturalKey'
  });
  assert.deepEqual([...merger.entries().keys()], ['Smith:2020ab']);
});

test('existing entries count for duplicate detection unless refreshing', () => {
  const existing = new Map([['Old:2019zz', '@article{Old:2019zz,\n  eprint = {1901.00001}\n}']]);

  const kept = new EntryMerger(existing).merge(succeeded('Fresh:2019aa', 'Fresh:2019aa', '@article{Fresh:2019aa,\n}', '1901.00001'));
  assert.equal(kept.kind, 'skipped-duplicate');

  const refreshed = new EntryMerger(existing, { fullRefresh: true });
  assert.equal(refreshed.contains('Old:2019zz'), false);
  assert.equal(refreshed.merge(succeeded('Fresh:2019aa', 'Fresh:2019aa', '@article{Fresh:2019aa,\n}', '1901.00001')).kind, 'accepted');
});

test('full refresh overwrites an existing entry and its stub', () => {
  const existing = new Map([
    ['LIGOScientific:2016aoc', '@article{LIGOScientific:2016aoc,\n  title = {Old}\n}'],
    ['1602.03837', '@misc{1602.03837,\n  crossref = {LIGOScientific:2016aoc}\n}']
  ]);
  const merger = new EntryMerger(existing, { fullRefresh: true });
  const disposition = merger.merge(succeeded('1602.03837', 'LIGOScientific:2016aoc', '@article{LIGOScientific:2016aoc,\n  title = {New}\n}'));

  assert.equal(disposition.kind, 'accepted');
  assert.equal(merger.entries().get('LIGOScientific:2016aoc'), '@article{LIGOScientific:2016aoc,\n  title = {New}\n}');
  assert.equal(disposition.kind === 'accepted' && disposition.stub?.key, '1602.03837');
});

test('accepted entries have their authors truncated and used macros expanded', () => {
  const merger = new EntryMerger(new Map(), {
    maxAuthors: 1,
    macros: new Map([['apj', 'ApJ'], ['mnras', 'MNRAS']])
  });
  const raw = '@article{A:2020aa,\n  author = {A, B. and C, D.},\n  journal = {\\apj}\n}';

  const disposition = merger.merge(succeeded('A:2020aa', 'A:2020aa', raw));
  assert.equal(
    disposition.kind === 'accepted' && disposition.entry,
    '@article{A:2020aa,\n  author = {A, B. and others},\n  journal = {ApJ}\n}'
  );
});

test('entries() returns a copy', () => {
  const merger = new EntryMerger(new Map());
  merger.entries().set('x', 'y');
  assert.equal(merger.entries().size, 0);
});

test('a later entry landing on a key accepted earlier in the run is a duplicate of it', () => {
  const merger = new EntryMerger(new Map());
  const first = merger.merge(succeeded('Abbott:2016abc', '2016PhRvL.116f1102A', '@article{2016PhRvL.116f1102A,\n  title = {First}\n}'));
  assert.equal(first.kind, 'accepted');

  const second = merger.merge(succeeded('1602.03837', 'Abbott:2016abc', '@article{Abbott:2016abc,\n  title = {Second}\n}', '1602.03837'));
  assert.deepEqual(second, {
    kind: 'skipped-duplicate',
    key: '1602.03837',
    winningKey: 'Abbott:2016abc',
    winningSourceKey: '2016PhRvL.116f1102A',
    matchedOn: 'naturalKey'
  });
  assert.deepEqual([...merger.entries()], [['Abbott:2016abc', '@article{Abbott:2016abc,\n  title = {First}\n}']]);
});
