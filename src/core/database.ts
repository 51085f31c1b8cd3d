import * as fs from 'fs';
import * as path from 'path';
import sqlite3 from 'sqlite3';
import { LoggerLike } from '../common/logger';

export type SqlParam = string | number | null;

export class Database {
  private db: sqlite3.Database;
  private logger: LoggerLike;
  private initialized: Promise<void>;

  constructor(dbPath: string, logger: LoggerLike) {
    this.logger = logger;
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    this.db = new sqlite3.Database(dbPath, (err: Error | null) => {
      if (err) this.logger.error('Failed to open database', err, { dbPath });
    });
    this.initialized = this.initialize();
    this.initialized.catch((error: unknown) => {
      this.logger.error('Database initialization failed', error);
    });
  }

  private async initialize(): Promise<void> {
    await this.exec(`
      CREATE TABLE IF NOT EXISTS diagnostic_runs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id TEXT NOT NULL UNIQUE,
        problem_text TEXT,
        status TEXT NOT NULL,
        well_formed INTEGER DEFAULT 0,
        safety_passed INTEGER DEFAULT 0,
        violation_count INTEGER DEFAULT 0,
        risk_level TEXT,
        executed INTEGER DEFAULT 0,
        exit_code INTEGER,
        restore_point_id TEXT,
        started_at TEXT,
        finished_at TEXT
      )
    `);

    await this.exec(`CREATE INDEX IF NOT EXISTS idx_runs_started ON diagnostic_runs(started_at)`);

    this.logger.debug('Database initialized');
  }

  async ensureInitialized(): Promise<void> {
    await this.initialized;
  }

  private exec(sql: string, params: SqlParam[] = []): Promise<{ lastID: number; changes: number }> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
        if (err) reject(err);
        else resolve({ lastID: this.lastID, changes: this.changes });
      });
    });
  }

  async run(sql: string, params: SqlParam[] = []): Promise<{ lastID: number; changes: number }> {
    await this.ensureInitialized();
    return this.exec(sql, params);
  }

  async get(sql: string, params: SqlParam[] = []): Promise<unknown> {
    await this.ensureInitialized();
    return new Promise((resolve, reject) => {
      this.db.get(sql, params, (err: Error | null, row: unknown) => {
        if (err) reject(err);
        else resolve(row);
      });
    });
  }

  async all(sql: string, params: SqlParam[] = []): Promise<unknown[]> {
    await this.ensureInitialized();
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (err: Error | null, rows: unknown[]) => {
        if (err) reject(err);
        else resolve(rows);
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close(err => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
