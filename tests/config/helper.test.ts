/**
 * Config Helper Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { ConfigHelper, parseYaml } from '../../src/config/helper.js';
import { VariableContainer } from '../../src/config/variables.js';
import { ConfigurationError } from '../../src/config/errors.js';

describe('ConfigHelper', () => {
  let testDir: string;
  let helper: ConfigHelper;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'helper-test-'));
    helper = new ConfigHelper(new VariableContainer({ env: 'prod', replicas: '3' }), testDir);
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('resolves paths against the base directory', () => {
    expect(helper.abspath('apps/web.json')).toBe(path.join(testDir, 'apps', 'web.json'));
  });

  it('keeps absolute paths', () => {
    expect(helper.abspath('/etc/hosts')).toBe('/etc/hosts');
  });

  it('reads files without rendering by default', () => {
    fs.writeFileSync(path.join(testDir, 'raw.txt'), 'env={{env}}');
    expect(helper.readFile('raw.txt')).toBe('env={{env}}');
  });

  it('renders file content on request', () => {
    fs.writeFileSync(path.join(testDir, 'tpl.txt'), 'env={{env}} color={{color}}');
    expect(helper.readFile('tpl.txt', { render: true, extraVars: { color: 'blue' } })).toBe(
      'env=prod color=blue',
    );
  });

  it('re-reads files on every call', () => {
    const file = path.join(testDir, 'changing.txt');
    fs.writeFileSync(file, 'one');
    expect(helper.readFile('changing.txt')).toBe('one');
    fs.writeFileSync(file, 'two');
    expect(helper.readFile('changing.txt')).toBe('two');
  });

  it('decodes rendered YAML', () => {
    fs.writeFileSync(path.join(testDir, 'app.yml'), 'id: /web-{{env}}\ninstances: {{replicas}}\n');
    expect(helper.readYaml('app.yml', { render: true })).toEqual({ id: '/web-prod', instances: 3 });
  });

  it('decodes rendered JSON', () => {
    fs.writeFileSync(path.join(testDir, 'app.json'), '{"id": "/web-{{env}}"}');
    expect(helper.readJson('app.json', { render: true })).toEqual({ id: '/web-prod' });
  });

  it('reports invalid JSON with the file name', () => {
    fs.writeFileSync(path.join(testDir, 'bad.json'), '{"id": ');
    expect(() => helper.readJson('bad.json')).toThrow(/JSON parsing error in bad.json/);
  });

  it('reports a missing file as a configuration error', () => {
    expect(() => helper.readFile('nope.txt')).toThrow(ConfigurationError);
    expect(() => helper.readFile('nope.txt')).toThrow(/Could not read/);
  });

  it('renders text against the container', () => {
    expect(helper.render('{{env}}-{{zone}}', { zone: 'a' })).toBe('prod-a');
  });
});

describe('parseYaml', () => {
  it('returns null for an empty document', () => {
    expect(parseYaml('', 'empty.yml')).toBeNull();
  });

  it('converts timestamps to ISO strings', () => {
    expect(parseYaml('at: 2024-01-02T03:04:05Z', 'ts.yml')).toEqual({
      at: '2024-01-02T03:04:05.000Z',
    });
  });

  it('reports syntax errors with the file name', () => {
    expect(() => parseYaml('key: [unclosed', 'broken.yml')).toThrow(/YAML parsing error in broken.yml/);
  });
});
