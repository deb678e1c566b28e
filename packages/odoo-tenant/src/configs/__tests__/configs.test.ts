import { describe, test, expect } from 'vitest';
import { DatabaseConfig } from '../database-config.js';
import { OdooConfig } from '../odoo-config.js';
import { ValidationError } from '../../errors.js';

describe('DatabaseConfig', () => {
  test('serializes to the setup file shape', () => {
    const config = new DatabaseConfig('postgres', 'odoo', 'test-secret');

    expect(config.toDict()).toEqual({ password: 'test-secret', user: 'odoo', name: 'postgres' });
    expect(DatabaseConfig.fromDict(config.toDict())).toEqual(config);
  });

  test.each([
    [['', 'odoo', 'pw'], 'Database name must not be empty'],
    [['postgres', '', 'pw'], 'Database user must not be empty'],
    [['postgres', 'odoo', ''], 'Database password must not be empty'],
  ] as const)('rejects empty fields %#', ([name, user, password], message) => {
    expect(() => new DatabaseConfig(name, user, password)).toThrow(ValidationError);
    expect(() => new DatabaseConfig(name, user, password)).toThrow(message);
  });
});

describe('OdooConfig', () => {
  test('stores the password under db_password', () => {
    const config = new OdooConfig('live', 'test-secret');

    expect(config.toDict()).toEqual({ name: 'live', db_password: 'test-secret' });
    expect(OdooConfig.fromDict({ name: 'live', db_password: 'test-secret' })).toEqual(config);
  });
});
