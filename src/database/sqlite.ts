'use strict';

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { logger } from '../services/utils/Logger';

export const IN_MEMORY = ':memory:';

/**
 * SQLite Database Manager
 * Handles database initialization and migrations for analysis results
 */
class SQLiteDatabase {
  private static instance: SQLiteDatabase;
  private db: Database.Database | null = null;
  private dbPath: string;

  private constructor(dbPath: string = path.join(process.cwd(), 'data', 'analysis.db')) {
    this.dbPath = dbPath;
  }

  /**
   * Get singleton instance of SQLiteDatabase
   */
  public static getInstance(dbPath?: string): SQLiteDatabase {
    if (!SQLiteDatabase.instance) {
      SQLiteDatabase.instance = new SQLiteDatabase(dbPath);
    }
    return SQLiteDatabase.instance;
  }

  /**
   * Open the database (a file path or ":memory:") and run migrations
   */
  public async initialize(dbPath?: string): Promise<void> {
    if (dbPath) {
      this.close();
      this.dbPath = dbPath;
    }
    if (this.db) {
      return;
    }

    try {
      if (this.dbPath !== IN_MEMORY) {
        await fs.promises.mkdir(path.dirname(this.dbPath), { recursive: true });
      }

      this.db = new Database(this.dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('cache_size = -64000');
      this.db.pragma('foreign_keys = ON');

      this.runMigrations(this.db);
      logger.info('SQLite database initialized successfully', { path: this.dbPath });
    } catch (error) {
      logger.error(`Failed to initialize database: ${error}`);
      throw new Error(`Database initialization failed: ${error}`);
    }
  }

  /**
   * Run database migrations
   */
  private runMigrations(db: Database.Database): void {
    try {
      db.exec(`
        CREATE TABLE IF NOT EXISTS analysis_runs (
          id TEXT PRIMARY KEY,
          token TEXT NOT NULL,
          pool TEXT NOT NULL,
          version TEXT NOT NULL,
          symbol0 TEXT NOT NULL,
          symbol1 TEXT NOT NULL,
          start_block INTEGER NOT NULL,
          end_block INTEGER NOT NULL,
          status TEXT NOT NULL,
          total_events INTEGER NOT NULL,
          total_swaps INTEGER NOT NULL,
          price_point_count INTEGER NOT NULL,
          large_purchase_count INTEGER NOT NULL,
          summary TEXT NOT NULL,
          created_at INTEGER NOT NULL
        );

        CREATE TABLE IF NOT EXISTS price_points (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          run_id TEXT NOT NULL,
          block_number INTEGER NOT NULL,
          tx_hash TEXT NOT NULL,
          log_index INTEGER NOT NULL,
          timestamp INTEGER,
          price_base REAL NOT NULL,
          price_ref REAL,
          base_price_ref REAL,
          method TEXT NOT NULL,
          confidence TEXT NOT NULL,
          FOREIGN KEY(run_id) REFERENCES analysis_runs(id) ON DELETE CASCADE
        );

        CREATE TABLE IF NOT EXISTS large_purchases (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          run_id TEXT NOT NULL,
          token TEXT NOT NULL,
          pool TEXT NOT NULL,
          block_number INTEGER NOT NULL,
          tx_hash TEXT NOT NULL,
          log_index INTEGER NOT NULL,
          buyer TEXT NOT NULL,
          base_amount_raw TEXT NOT NULL,
          base_amount REAL NOT NULL,
          token_amount_raw TEXT NOT NULL,
          ref_amount_micro TEXT,
          ref_source TEXT,
          by_base INTEGER NOT NULL,
          by_ref INTEGER NOT NULL,
          created_at INTEGER NOT NULL,
          FOREIGN KEY(run_id) REFERENCES analysis_runs(id) ON DELETE CASCADE
        );

        CREATE INDEX IF NOT EXISTS idx_analysis_runs_token ON analysis_runs(token);
        CREATE INDEX IF NOT EXISTS idx_analysis_runs_created_at ON analysis_runs(created_at);
        CREATE INDEX IF NOT EXISTS idx_price_points_run ON price_points(run_id, block_number);
        CREATE INDEX IF NOT EXISTS idx_large_purchases_run ON large_purchases(run_id);
        CREATE INDEX IF NOT EXISTS idx_large_purchases_token ON large_purchases(token);
      `);

      logger.debug('Database migrations completed');
    } catch (error) {
      logger.error(`Migration failed: ${error}`);
      throw new Error(`Database migration failed: ${error}`);
    }
  }

  public getConnection(): Database.Database {
    if (!this.db) {
      throw new Error('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  /**
   * Prepare a statement with typed rows
   */
  public prepare<Row = unknown>(sql: string): Database.Statement<unknown[], Row> {
    return this.getConnection().prepare<unknown[], Row>(sql);
  }

  /**
   * Execute a transaction
   */
  public transaction<T>(fn: () => T): T {
    const transaction = this.getConnection().transaction(fn);
    return transaction();
  }

  /**
   * Close database connection
   */
  public close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      logger.info('Database connection closed');
    }
  }

  public isOpen(): boolean {
    return this.db !== null;
  }

  /**
   * Get database statistics
   */
  public getStats(): { path: string; open: boolean } {
    return {
      path: this.dbPath,
      open: this.isOpen(),
    };
  }
}

export default SQLiteDatabase.getInstance();
