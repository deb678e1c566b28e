import { describe, test, expect } from 'vitest';
import path from 'path';
import { resolveDatabaseEndpoint, resolveProjectPaths } from '../config.js';
import { ValidationError } from '../errors.js';

describe('resolveProjectPaths', () => {
  test('places both files in the resolved directory', () => {
    const paths = resolveProjectPaths('some/project');
    const dir = path.resolve(process.cwd(), 'some/project');

    expect(paths).toEqual({
      dir,
      composeFile: path.join(dir, 'docker-compose.yml'),
      setupFile: path.join(dir, 'setup.yml'),
    });
  });
});

describe('resolveDatabaseEndpoint', () => {
  test('defaults to localhost:5432', () => {
    expect(resolveDatabaseEndpoint({}, {})).toEqual({ host: 'localhost', port: 5432 });
  });

  test('falls back to PGHOST and PGPORT', () => {
    expect(resolveDatabaseEndpoint({}, { PGHOST: 'db.internal', PGPORT: '6432' })).toEqual({
      host: 'db.internal',
      port: 6432,
    });
  });

  test('prefers command options over the environment', () => {
    expect(
      resolveDatabaseEndpoint({ dbHost: '10.0.0.5', dbPort: '15432' }, { PGHOST: 'db.internal', PGPORT: '6432' })
    ).toEqual({ host: '10.0.0.5', port: 15432 });
  });

  test.each(['abc', '0', '70000'])('rejects port %s', (port) => {
    expect(() => resolveDatabaseEndpoint({ dbPort: port }, {})).toThrow(ValidationError);
    expect(() => resolveDatabaseEndpoint({ dbPort: port }, {})).toThrow(`Invalid database port '${port}'`);
  });
});
