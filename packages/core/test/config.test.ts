import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import test, { after } from 'node:test';

import { configFromEnv, loadConfigYaml, mergeConfigLayers, parseConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

const dir = mkdtempSync(join(tmpdir(), 'citefetch-config-'));
after(() => rmSync(dir, { recursive: true, force: true }));

test('defaults fill in everything optional', () => {
  const config = parseConfig({});
  assert.equal(config.preferredSource, 'ads');
  assert.equal(config.concurrency, 4);
  assert.equal(config.timeoutMs, 20000);
  assert.equal(config.fullRefresh, false);
  assert.equal(config.preferRemote, false);
  assert.equal(config.verbose, false);
  assert.equal(config.maxAuthors, undefined);
  assert.ok(Object.isFrozen(config));
});

test('invalid values are reported with their path', () => {
  assert.throws(
    () => parseConfig({ concurrency: 0, preferredSource: 'crossref' }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.deepEqual(error.issues.map(issue => issue.split(':')[0]), ['preferredSource', 'concurrency']);
      return true;
    }
  );
});

test('unknown keys are rejected', () => {
  assert.throws(() => parseConfig({ bogus: true }), (error: unknown) => {
    assert.ok(error instanceof ConfigError);
    assert.equal(error.issues.length, 1);
    assert.match(error.issues[0] ?? '', /^\(root\): Unrecognized key/);
    return true;
  });
});

test('a missing config file reads as empty', () => {
  assert.deepEqual(loadConfigYaml(join(dir, 'absent.yml')), {});
});

test('a YAML mapping is read as-is', () => {
  const file = join(dir, 'citefetch.yml');
  writeFileSync(file, 'preferredSource: inspire\nconcurrency: 2\nmaxAuthors: 10\n');
  assert.deepEqual(loadConfigYaml(file), { preferredSource: 'inspire', concurrency: 2, maxAuthors: 10 });
});

test('a YAML document that is not a mapping is a config error', () => {
  const file = join(dir, 'list.yml');
  writeFileSync(file, '- ads\n- inspire\n');
  assert.throws(() => loadConfigYaml(file), ConfigError);
});

test('later layers win and undefined values do not override', () => {
  assert.deepEqual(
    mergeConfigLayers({ preferredSource: 'inspire', concurrency: 2 }, { concurrency: undefined, verbose: true }, { preferredSource: 'auto' }),
    { preferredSource: 'auto', concurrency: 2, verbose: true }
  );
});

test('environment variables supply keys and debug logging', () => {
  assert.deepEqual(configFromEnv({ ADS_API_KEY: 'test-token', CITEFETCH_DEBUG: '1', CONTACT_EMAIL: '' }), {
    adsApiKey: 'test-token',
    semanticScholarApiKey: undefined,
    contactEmail: undefined,
    verbose: true
  });
});
