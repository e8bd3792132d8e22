import assert from 'node:assert/strict';
import test from 'node:test';

import {
  expandAasMacros,
  extractBibtexFields,
  extractBibtexKey,
  findUsedMacros,
  makeCrossrefStub,
  parseAasMacros,
  parseBibEntries,
  replaceBibtexKey,
  truncateAuthors
} from '../src/bibtex.js';

const ENTRY = [
  '@article{LIGOScientific:2016aoc,',
  '  author = {Abbott, B. P. and Smith, J. and Doe, A.},',
  '  title = "{Observation of Gravitational Waves}",',
  '  eprint = {1602.03837},',
  '  doi = {10.1103/PhysRevLett.116.061102},',
  '  journal = {\\prl}',
  '}'
].join('\n');

test('extractBibtexKey reads the first entry key', () => {
  assert.equal(extractBibtexKey(ENTRY), 'LIGOScientific:2016aoc');
  assert.equal(extractBibtexKey('no entry here'), undefined);
});

test('replaceBibtexKey rewrites the first key only', () => {
  const two = '@misc{a,\n  title = {A}\n}\n@misc{b,\n  title = {B}\n}';
  assert.equal(replaceBibtexKey(two, 'x$&y'), '@misc{x$&y,\n  title = {A}\n}\n@misc{b,\n  title = {B}\n}');
});

test('extractBibtexFields reads braced and quoted values and omits missing ones', () => {
  assert.deepEqual(extractBibtexFields(ENTRY, 'eprint', 'doi', 'volume'), {
    eprint: '1602.03837',
    doi: '10.1103/PhysRevLett.116.061102'
  });
  assert.deepEqual(extractBibtexFields('@misc{k,\n  eprint = "2508.18080"\n}', 'eprint'), { eprint: '2508.18080' });
});

test('makeCrossrefStub builds a misc entry pointing at the target', () => {
  assert.equal(makeCrossrefStub('1602.03837', 'LIGOScientific:2016aoc'), '@misc{1602.03837,\n  crossref = {LIGOScientific:2016aoc}\n}');
});

test('parseBibEntries matches nested braces, skips non-entries and keeps the first duplicate', () => {
  const content = [
    '@comment{ignored, text}',
    '@string{apj = "ApJ"}',
    '@article{a,',
    '  title = {{Nested} braces}',
    '}',
    '',
    '@misc{b, note = {x}}',
    '@misc{a, note = {second}}'
  ].join('\n');

  const entries = parseBibEntries(content);
  assert.deepEqual([...entries.keys()], ['a', 'b']);
  assert.equal(entries.get('a'), '@article{a,\n  title = {{Nested} braces}\n}');
  assert.equal(entries.get('b'), '@misc{b, note = {x}}');
});

test('truncateAuthors keeps the first names and appends others', () => {
  const entry = '@article{K,\n  author = {Abbott, B. P. and Smith, J. and Doe, A.},\n  title = {T}\n}';
  assert.equal(
    truncateAuthors(entry, 2),
    '@article{K,\n  author = {Abbott, B. P. and Smith, J. and others},\n  title = {T}\n}'
  );
  assert.equal(truncateAuthors(entry, 3), entry);
  assert.equal(truncateAuthors(entry, 0), entry);
  assert.equal(truncateAuthors(entry), entry);
});

test('AAS macros are parsed with aliases and expanded only where used', () => {
  const sty = [
    '\\def\\apj{\\ref@jnl{ApJ}}',
    '\\def\\prl{\\ref@jnl{Phys.~Rev.~Lett.}}',
    '\\let\\astrophj\\apj',
    '\\def\\mnras{\\ref@jnl{MNRAS}}'
  ].join('\n');

  const macros = parseAasMacros(sty);
  assert.deepEqual([...macros.entries()], [
    ['apj', 'ApJ'],
    ['prl', 'Phys.~Rev.~Lett.'],
    ['mnras', 'MNRAS'],
    ['astrophj', 'ApJ']
  ]);

  const used = findUsedMacros(ENTRY, macros);
  assert.deepEqual([...used.keys()], ['prl']);
  assert.equal(expandAasMacros('  journal = {\\prl},\n  note = {\\prlx}', used), '  journal = {Phys.~Rev.~Lett.},\n  note = {\\prlx}');
});
