import assert from 'node:assert/strict';
import test, { after } from 'node:test';
import { toCitationKey } from '@citefetch/core';

import { createSemanticScholarAdapter } from '../../src/providers/semanticscholar.js';
import { at, installMockAgent } from '../mock-http.js';

const agent = installMockAgent();
const s2 = agent.get('https://api.semanticscholar.org');
const inspire = agent.get('https://inspirehep.net');
after(() => agent.close());

const PAPER_BIBTEX = '@Article{Abbott2016ObservationOG,\n author = {B. Abbott},\n title = {Observation}\n}';

test('arXiv keys are looked up by arXiv id, sending the API key', async () => {
  s2.intercept({
    path: at('/graph/v1/paper/arXiv:1602.03837', { fields: 'externalIds,citationStyles' }),
    method: 'GET',
    headers: { 'x-api-key': 'test-key' }
  }).reply(200, {
    paperId: 'abc123',
    externalIds: { ArXiv: '1602.03837', DOI: '10.1103/PhysRevLett.116.061102', CorpusId: 124959 },
    citationStyles: { bibtex: `${PAPER_BIBTEX}\n` }
  });

  const outcome = await createSemanticScholarAdapter({ apiKey: 'test-key' }).fetch(toCitationKey('1602.03837'));
  assert.deepEqual(outcome, {
    ok: true,
    rawEntry: PAPER_BIBTEX,
    sourceKey: 'Abbott2016ObservationOG',
    eprint: '1602.03837',
    doi: '10.1103/PhysRevLett.116.061102',
    via: 'Semantic Scholar (arXiv:1602.03837)'
  });
});

test('texkeys without an arXiv id are looked up by the DOI INSPIRE records', async () => {
  inspire.intercept({ path: at('/api/literature', { q: 'texkeys:Einstein:1916vd' }), method: 'GET' })
    .reply(200, { hits: { hits: [{ metadata: { dois: [{ value: '10.1002/andp.19163540702' }] } }] } });
  s2.intercept({ path: at('/graph/v1/paper/DOI:10.1002/andp.19163540702'), method: 'GET' })
    .reply(200, {
      paperId: 'def456',
      externalIds: { DOI: '10.1002/andp.19163540702' },
      citationStyles: { bibtex: '@Article{Einstein1916,\n title = {Grundlage}\n}' }
    });

  const outcome = await createSemanticScholarAdapter().fetch(toCitationKey('Einstein:1916vd'));
  assert.equal(outcome.ok && outcome.via, 'Semantic Scholar (DOI:10.1002/andp.19163540702)');
  assert.equal(outcome.ok && outcome.eprint, undefined);
});

test('a texkey INSPIRE does not know is not found', async () => {
  inspire.intercept({ path: at('/api/literature', { q: 'texkeys:Nobody:2020zz' }), method: 'GET' })
    .reply(200, { hits: { hits: [] } });

  const outcome = await createSemanticScholarAdapter().fetch(toCitationKey('Nobody:2020zz'));
  assert.deepEqual(outcome, { ok: false, reason: 'not-found', message: 'No arXiv id or DOI known for Nobody:2020zz' });
});

test('a paper without BibTeX is malformed', async () => {
  s2.intercept({ path: at('/graph/v1/paper/arXiv:2508.18080'), method: 'GET' })
    .reply(200, { paperId: 'x', externalIds: null, citationStyles: null });

  const outcome = await createSemanticScholarAdapter().fetch(toCitationKey('2508.18080'));
  assert.deepEqual(outcome, { ok: false, reason: 'malformed', message: 'Semantic Scholar has no BibTeX for arXiv:2508.18080' });
});

test('a missing paper is not found', async () => {
  s2.intercept({ path: at('/graph/v1/paper/arXiv:2508.18081'), method: 'GET' })
    .reply(404, { error: 'Paper with id arXiv:2508.18081 not found' });

  const outcome = await createSemanticScholarAdapter().fetch(toCitationKey('2508.18081'));
  assert.equal(!outcome.ok && outcome.reason, 'not-found');
});

test('bibcodes are declined without a request', async () => {
  const outcome = await createSemanticScholarAdapter().fetch(toCitationKey('2016PhRvL.116f1102A'));
  assert.deepEqual(outcome, { ok: false, reason: 'not-found', message: 'Semantic Scholar cannot look up ads-bibcode keys' });
});
