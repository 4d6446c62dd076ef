import os from 'os';
import path from 'path';
import { ConfigError, loadConfig } from './config';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({}, '/srv/ledger')).toEqual({
      dbPath: path.join(os.tmpdir(), 'expenses.db'),
      categoriesPath: path.join('/srv/ledger', 'categories.json'),
      transport: 'http',
      host: '0.0.0.0',
      port: 8000
    });
  });

  it('should read every variable', () => {
    const config = loadConfig({
      EXPENSE_DB_PATH: '/data/ledger.db',
      EXPENSE_CATEGORIES_PATH: '/data/categories.json',
      MCP_TRANSPORT: 'stdio',
      HOST: '127.0.0.1',
      PORT: '9100'
    });

    expect(config).toEqual({
      dbPath: '/data/ledger.db',
      categoriesPath: '/data/categories.json',
      transport: 'stdio',
      host: '127.0.0.1',
      port: 9100
    });
  });

  it('should treat empty variables as unset', () => {
    const config = loadConfig({ EXPENSE_DB_PATH: '', PORT: '' }, '/srv/ledger');
    expect(config.dbPath).toBe(path.join(os.tmpdir(), 'expenses.db'));
    expect(config.port).toBe(8000);
  });

  it('should reject a bad transport and port together', () => {
    try {
      loadConfig({ MCP_TRANSPORT: 'sse', PORT: '70000' });
      throw new Error('expected loadConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError && error.errors).toEqual([
        'MCP_TRANSPORT must be one of: http, stdio',
        'PORT must be an integer between 1 and 65535'
      ]);
    }
  });
});
