import assert from 'node:assert/strict';
import test from 'node:test';

import { explainRoute, route } from '../src/router.js';

test('auto routes bibcodes to ADS first and everything else to INSPIRE first', () => {
  assert.deepEqual(route('auto', 'ads-bibcode'), ['ads', 'inspire', 'semantic-scholar']);
  assert.deepEqual(route('auto', 'inspire'), ['inspire', 'ads', 'semantic-scholar']);
  assert.deepEqual(route('auto', 'arxiv-new'), ['inspire', 'ads', 'semantic-scholar']);
  assert.deepEqual(route('auto', 'unrecognized'), ['inspire', 'ads', 'semantic-scholar']);
});

test('a named policy puts its provider first regardless of format', () => {
  assert.deepEqual(route('ads', 'inspire'), ['ads', 'inspire', 'semantic-scholar']);
  assert.deepEqual(route('inspire', 'ads-bibcode'), ['inspire', 'ads', 'semantic-scholar']);
  assert.deepEqual(route('semantic-scholar', 'arxiv-old'), ['semantic-scholar', 'inspire', 'ads']);
});

test('a key in the local source is tried locally before any remote provider', () => {
  assert.deepEqual(route('ads', 'inspire', { inLocalSource: true }), ['local', 'ads', 'inspire', 'semantic-scholar']);
  assert.deepEqual(route('auto', 'unrecognized', { inLocalSource: true }), ['local', 'inspire', 'ads', 'semantic-scholar']);
});

test('preferring remote drops the local source except as a last resort for unrecognized keys', () => {
  assert.deepEqual(
    route('ads', 'inspire', { inLocalSource: true, preferRemote: true }),
    ['ads', 'inspire', 'semantic-scholar']
  );
  assert.deepEqual(
    route('ads', 'unrecognized', { inLocalSource: true, preferRemote: true }),
    ['ads', 'inspire', 'semantic-scholar', 'local']
  );
});

test('route returns a fresh array each call', () => {
  const first = route('ads', 'inspire');
  first.pop();
  assert.deepEqual(route('ads', 'inspire'), ['ads', 'inspire', 'semantic-scholar']);
});

test('explainRoute describes why the order was chosen', () => {
  assert.deepEqual(explainRoute('auto', 'ads-bibcode'), {
    order: ['ads', 'inspire', 'semantic-scholar'],
    reason: 'ADS bibcode detected: ADS prioritized'
  });
  assert.equal(explainRoute('auto', 'arxiv-new').reason, 'Not an ADS bibcode: INSPIRE prioritized');
  assert.equal(
    explainRoute('inspire', 'inspire', { inLocalSource: true }).reason,
    'Preferred source inspire tried first; key found in local source: tried before any remote provider'
  );
  assert.equal(
    explainRoute('ads', 'unrecognized', { inLocalSource: true, preferRemote: true }).reason,
    'Preferred source ads tried first; key found in local source: kept as last fallback for an unrecognized key'
  );
});
