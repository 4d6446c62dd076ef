import fs from 'fs';
import os from 'os';
import path from 'path';
import { createExpenseDatabase, initializeSchema } from './database';
import { ConnectionFactory, sqliteConnectionFactory } from './driver';
import { createExpenseOperations, ExpenseOperations } from './expenses';

export interface TempLedger {
  dir: string;
  dbPath: string;
  connect: ConnectionFactory;
  operations: ExpenseOperations;
  cleanup(): void;
}

// Fresh, initialized database file in its own temp directory
export function createTempLedger(): TempLedger {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'expense-ledger-'));
  const dbPath = path.join(dir, 'expenses.db');
  const connect = sqliteConnectionFactory(dbPath);
  initializeSchema(connect);

  return {
    dir,
    dbPath,
    connect,
    operations: createExpenseOperations(createExpenseDatabase(connect)),
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true })
  };
}

export function silenceLogs(): jest.SpyInstance {
  return jest.spyOn(console, 'error').mockImplementation(() => undefined);
}
