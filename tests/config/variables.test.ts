/**
 * Variable Resolver Tests
 */

import { describe, it, expect } from 'vitest';
import {
  VariableContainer,
  environmentNameFor,
  resolveVariables,
} from '../../src/config/variables.js';
import { ConfigurationError } from '../../src/config/errors.js';

describe('resolveVariables', () => {
  describe('precedence', () => {
    const declared = { region: { from: 'REGION', default: 'us-east' } };

    it('uses the default when nothing else is set', () => {
      expect(resolveVariables(declared, {}, {}).get('region')).toBe('us-east');
    });

    it('prefers the environment over the default', () => {
      expect(resolveVariables(declared, {}, { REGION: 'eu-west' }).get('region')).toBe('eu-west');
    });

    it('prefers provided values over the environment', () => {
      const variables = resolveVariables(declared, { region: 'ap-south' }, { REGION: 'eu-west' });
      expect(variables.get('region')).toBe('ap-south');
    });

    it('derives the environment name when from is not declared', () => {
      const variables = resolveVariables({ 'db-host': {} }, {}, { VAR_DB_HOST: 'db.internal' });
      expect(variables.get('db-host')).toBe('db.internal');
    });

    it('ignores the derived name when from is declared', () => {
      const variables = resolveVariables({ port: { from: 'PORT' } }, {}, { VAR_PORT: '1' });
      expect(variables.get('port')).toBeNull();
    });

    it('only reads variables set in the environment itself', () => {
      const variables = resolveVariables({ label: { from: 'toString', default: 'none' } }, {}, {});
      expect(variables.get('label')).toBe('none');
    });

    it('uses an empty environment value rather than the default', () => {
      const variables = resolveVariables({ suffix: { default: '-x' } }, {}, { VAR_SUFFIX: '' });
      expect(variables.get('suffix')).toBe('');
    });
  });

  describe('required', () => {
    it('fails when a required variable has no value', () => {
      expect(() => resolveVariables({ token: { required: true } }, {}, {})).toThrow(
        'Missing required variable token',
      );
    });

    it('treats an empty string as missing', () => {
      expect(() => resolveVariables({ token: { required: true } }, { token: '' }, {})).toThrow(
        ConfigurationError,
      );
    });

    it('suggests how to provide the value', () => {
      try {
        resolveVariables({ 'api-key': { required: true } }, {}, {});
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error).toMatchObject({
          suggestion: 'Provide it with --var api-key=<value> or set VAR_API_KEY',
        });
      }
    });

    it('accepts a required variable satisfied by its default', () => {
      expect(resolveVariables({ env: { required: true, default: 'dev' } }, {}, {}).get('env')).toBe('dev');
    });
  });

  describe('allowed values', () => {
    const declared = { mode: { values: ['a', 'b'] } };

    it('rejects a value outside the allow-list', () => {
      expect(() => resolveVariables(declared, { mode: 'c' }, {})).toThrow(
        "Value 'c' not allowed for mode. Possible values: a,b",
      );
    });

    it('accepts a listed value', () => {
      expect(resolveVariables(declared, { mode: 'a' }, {}).get('mode')).toBe('a');
    });

    it('rejects an unresolved value when an allow-list exists', () => {
      expect(() => resolveVariables(declared, {}, {})).toThrow(ConfigurationError);
    });

    it('compares numeric allow-list entries as strings', () => {
      const variables = resolveVariables({ replicas: { values: [1, 3], default: 3 } }, {}, {});
      expect(variables.get('replicas')).toBe('3');
    });
  });

  it('converts scalar defaults to strings', () => {
    const variables = resolveVariables({ debug: { default: false }, count: { default: 2 } }, {}, {});
    expect(variables.get('debug')).toBe('false');
    expect(variables.get('count')).toBe('2');
  });

  it('declares a bare variable as unresolved', () => {
    const variables = resolveVariables({ optional: null }, {}, {});
    expect(variables.has('optional')).toBe(true);
    expect(variables.get('optional')).toBeNull();
  });

  it('passes undeclared provided variables through', () => {
    const variables = resolveVariables({ env: { default: 'dev' } }, { build: '42' }, {});
    expect(variables.toRecord()).toEqual({ env: 'dev', build: '42' });
  });

  it('accepts a missing variables section', () => {
    expect(resolveVariables(undefined, {}, {}).names()).toEqual([]);
  });

  it('rejects a malformed definition', () => {
    expect(() => resolveVariables({ env: { required: 'yes' } }, {}, {})).toThrow(
      /Invalid variables section/,
    );
  });
});

describe('environmentNameFor', () => {
  it('upper-cases and replaces dashes', () => {
    expect(environmentNameFor('db-host')).toBe('VAR_DB_HOST');
  });
});

describe('VariableContainer', () => {
  it('renders with extra variables without changing its values', () => {
    const container = new VariableContainer({ name: 'base' });
    expect(container.render('{{name}}', { name: 'extra' })).toBe('extra');
    expect(container.get('name')).toBe('base');
  });

  it('returns undefined for undeclared names', () => {
    const container = new VariableContainer({});
    expect(container.has('nope')).toBe(false);
    expect(container.get('nope')).toBeUndefined();
  });

  it('fails to render names inherited from Object.prototype', () => {
    const container = resolveVariables({}, {}, {});
    expect(() => container.render('x={{toString}}')).toThrow(
      'Unresolved variable in template: {{toString}}',
    );
    expect(container.has('hasOwnProperty')).toBe(false);
  });

  it('is not affected by changes to the source record', () => {
    const source: Record<string, string | null> = { env: 'dev' };
    const container = new VariableContainer(source);
    source.env = 'prod';
    expect(container.get('env')).toBe('dev');
  });
});
