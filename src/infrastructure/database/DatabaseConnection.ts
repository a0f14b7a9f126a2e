import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export interface DatabaseStatistics {
  totalJobs: number;
  totalChunks: number;
  failedChunks: number;
  databaseSize: number;
}

/**
 * Database connection manager for extraction results
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = 'data/results.db') {
    const inMemory = dbPath === ':memory:';
    this.dbPath = inMemory ? dbPath : path.resolve(process.cwd(), dbPath);

    if (!inMemory) {
      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    if (!inMemory) {
      // Enable WAL mode for better concurrency
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chunk_results (
        job_id TEXT NOT NULL,
        chunk_index INTEGER NOT NULL,
        status TEXT NOT NULL,
        content TEXT,
        server TEXT,
        attempts INTEGER NOT NULL DEFAULT 0,
        latency_ms INTEGER,
        reason TEXT,
        error TEXT,
        observations_count INTEGER NOT NULL DEFAULT 0,
        stored_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (job_id, chunk_index)
      );

      CREATE INDEX IF NOT EXISTS idx_chunk_results_status ON chunk_results(status);
      CREATE INDEX IF NOT EXISTS idx_chunk_results_stored ON chunk_results(stored_at);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): DatabaseStatistics {
    const row = this.db
      .prepare(
        `SELECT
           COUNT(DISTINCT job_id) AS totalJobs,
           COUNT(*) AS totalChunks,
           SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) AS failedChunks
         FROM chunk_results`
      )
      .get() as { totalJobs: number; totalChunks: number; failedChunks: number | null };

    let databaseSize = 0;
    if (this.dbPath !== ':memory:' && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return {
      totalJobs: row.totalJobs,
      totalChunks: row.totalChunks,
      failedChunks: row.failedChunks ?? 0,
      databaseSize,
    };
  }
}
