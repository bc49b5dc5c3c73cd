/**
 * Config Loader Integration Tests
 *
 * Loads complete documents from a temporary directory through the built-in
 * modules and an in-memory plugin source.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { loadDeploymentConfig } from '../../src/config/loader.js';
import { ConfigurationError, ModuleContractError } from '../../src/config/errors.js';
import { AppDeployment, SecretDeployment } from '../../src/modules/builtin/index.js';
import type { EntityModule, ModuleSource } from '../../src/modules/types.js';

describe('loadDeploymentConfig', () => {
  let testDir: string;

  const write = (name: string, content: string): string => {
    const file = path.join(testDir, name);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
    return file;
  };

  const queueParse = vi.fn((name: string) => ({ queue: name }));
  const queueModule: EntityModule = {
    configKey: 'queues',
    sectionType: 'queue',
    createManager: () => ({ describe: () => 'queue' }),
    parse: queueParse,
  };
  const sources: ModuleSource[] = [{ name: 'plugins', modules: { queue: queueModule } }];

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'loader-test-'));
    queueParse.mockClear();
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('resolves a complete document', () => {
    write('apps/web.json', '{"id": "/{{env}}/web", "instances": 2}');
    write(
      'deploy.yml',
      [
        'variables:',
        '  env:',
        '    values: [dev, prod]',
        '    default: dev',
        'db-password:',
        '  type: secret',
        '  path: "{{env}}/db"',
        '  value: hunter',
        'web:',
        '  type: app',
        '  definition: apps/web.json',
        '  dependencies:',
        '    - db-password',
        '    - db-password:update',
        '',
      ].join('\n'),
    );

    const result = loadDeploymentConfig(path.join(testDir, 'deploy.yml'), { env: 'prod' }, { env: {} });

    expect(Array.from(result.deploymentObjects.keys())).toEqual(['db-password', 'web']);
    const web = result.deploymentObjects.get('web');
    expect(web).toBeInstanceOf(AppDeployment);
    expect(web).toMatchObject({ appId: '/prod/web' });

    const secret = result.deploymentObjects.get('db-password');
    expect(result.dependencies.get('web')).toEqual([
      { name: 'db-password', target: secret, kind: 'create' },
      { name: 'db-password', target: secret, kind: 'update' },
    ]);
    expect(result.dependencies.has('db-password')).toBe(false);
    expect(Array.from(result.managers.keys())).toEqual(['secrets', 'jobs', 'apps']);
    expect(result.entityManagers.get('web')).toBe('apps');
  });

  it('reads variables from the environment', () => {
    write('deploy.yml', 'variables:\n  region:\n    from: REGION\n    default: us-east\n');

    const fromEnv = loadDeploymentConfig(path.join(testDir, 'deploy.yml'), {}, { env: { REGION: 'eu-west' } });
    const overridden = loadDeploymentConfig(
      path.join(testDir, 'deploy.yml'),
      { region: 'ap-south' },
      { env: { REGION: 'eu-west' } },
    );

    expect(fromEnv.variables.get('region')).toBe('eu-west');
    expect(overridden.variables.get('region')).toBe('ap-south');
  });

  it('fails on a missing required variable before parsing any entity', () => {
    write(
      'deploy.yml',
      ['modules: [queue]', 'variables:', '  token:', '    required: true', 'events:', '  type: queue', ''].join('\n'),
    );

    expect(() => loadDeploymentConfig(path.join(testDir, 'deploy.yml'), {}, { sources, env: {} })).toThrow(
      'Missing required variable token',
    );
    expect(queueParse).not.toHaveBeenCalled();
  });

  it('filters entities by only/except', () => {
    write(
      'deploy.yml',
      [
        'modules: [queue]',
        'variables:',
        '  env: {default: dev}',
        'prod-events:',
        '  type: queue',
        '  only: {env: prod}',
        'debug-events:',
        '  type: queue',
        '  except: {env: prod}',
        '',
      ].join('\n'),
    );
    const file = path.join(testDir, 'deploy.yml');

    expect(Array.from(loadDeploymentConfig(file, {}, { sources, env: {} }).deploymentObjects.keys())).toEqual([
      'debug-events',
    ]);
    expect(
      Array.from(loadDeploymentConfig(file, { env: 'prod' }, { sources, env: {} }).deploymentObjects.keys()),
    ).toEqual(['prod-events']);
  });

  it('parses integer-like entity names in document order', () => {
    write(
      'deploy.yml',
      ['modules: [queue]', 'web:', '  type: queue', '"10":', '  type: queue', '2:', '  type: queue', ''].join('\n'),
    );

    const result = loadDeploymentConfig(path.join(testDir, 'deploy.yml'), {}, { sources, env: {} });

    expect(Array.from(result.deploymentObjects.keys())).toEqual(['web', '10', '2']);
    expect(queueParse.mock.calls.map(([name]) => name)).toEqual(['web', '10', '2']);
  });

  it('fails on a dependency on an excluded entity', () => {
    write(
      'deploy.yml',
      [
        'modules: [queue]',
        'events:',
        '  type: queue',
        '  only: {env: prod}',
        'consumer:',
        '  type: queue',
        '  dependencies: [events]',
        '',
      ].join('\n'),
    );

    expect(() => loadDeploymentConfig(path.join(testDir, 'deploy.yml'), {}, { sources, env: {} })).toThrow(
      'Could not find dependency events required by consumer',
    );
  });

  describe('includes', () => {
    it('merges included entities and resolves paths against the root directory', () => {
      write('config/secrets.yml', 'api-key:\n  type: secret\n  path: api\n  file: files/key.txt\n');
      write('files/key.txt', 'k');
      write('deploy.yml', 'includes:\n  - config/secrets.yml\n');

      const result = loadDeploymentConfig(path.join(testDir, 'deploy.yml'), {}, { env: {} });

      const secret = result.deploymentObjects.get('api-key');
      expect(secret).toBeInstanceOf(SecretDeployment);
      expect(secret).toMatchObject({ value: 'k' });
    });

    it('accepts variables declared in an include', () => {
      write('vars.yml', 'variables:\n  env: {default: staging}\n');
      write('deploy.yml', 'includes: [vars.yml]\n');

      const result = loadDeploymentConfig(path.join(testDir, 'deploy.yml'), {}, { env: {} });

      expect(result.variables.get('env')).toBe('staging');
    });

    it('fails when an include redeclares a key', () => {
      write('more.yml', 'jobs:\n  type: queue\n');
      write('deploy.yml', 'includes: [more.yml]\nmodules: [queue]\njobs:\n  type: queue\n');

      expect(() => loadDeploymentConfig(path.join(testDir, 'deploy.yml'), {}, { sources, env: {} })).toThrow(
        /jobs found in base config and include file more\.yml/,
      );
    });
  });

  describe('modules', () => {
    it('fails on an unknown entity type', () => {
      write('deploy.yml', 'events:\n  type: queue\n');

      expect(() => loadDeploymentConfig(path.join(testDir, 'deploy.yml'), {}, { env: {} })).toThrow(
        ConfigurationError,
      );
    });

    it('fails when a listed module cannot be loaded', () => {
      write('deploy.yml', 'modules: [plugins:missing]\n');

      expect(() => loadDeploymentConfig(path.join(testDir, 'deploy.yml'), {}, { sources, env: {} })).toThrow(
        'Could not load module plugins:missing',
      );
    });

    it('keeps module defects distinct from configuration errors', () => {
      const broken: ModuleSource = {
        name: 'broken',
        modules: { queue: { ...queueModule, parse: () => undefined } },
      };
      write('deploy.yml', 'modules: [queue]\nevents:\n  type: queue\n');

      expect(() =>
        loadDeploymentConfig(path.join(testDir, 'deploy.yml'), {}, { sources: [broken], env: {} }),
      ).toThrow(ModuleContractError);
    });
  });

  it('fails when the document does not exist', () => {
    expect(() => loadDeploymentConfig(path.join(testDir, 'missing.yml'))).toThrow(/Could not read/);
  });
});
