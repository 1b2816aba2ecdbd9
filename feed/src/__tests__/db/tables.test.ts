import { ALL_TABLES, getTableName } from '../../db/tables';

describe('getTableName', () => {
  const originalEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
  });

  it('should add the test prefix once in the test environment', () => {
    process.env.NODE_ENV = 'test';
    expect(getTableName('option_snapshots')).toBe('test_option_snapshots');
    expect(getTableName(getTableName('option_snapshots'))).toBe('test_option_snapshots');
  });

  it('should leave names alone elsewhere', () => {
    process.env.NODE_ENV = 'production';
    expect(ALL_TABLES.map(getTableName)).toEqual(['option_snapshots', 'option_snapshot_passes']);
  });
});
