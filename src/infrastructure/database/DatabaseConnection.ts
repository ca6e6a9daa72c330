import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { JobStatus, isJobStatus } from '../../core/entities/Job.js';

export const IN_MEMORY_DATABASE = ':memory:';

export interface DatabaseStatistics {
  totalJobs: number;
  databaseSize: number;
  jobStats: Record<JobStatus, number>;
}

interface CountRow {
  count: number;
}

interface StatusCountRow {
  status: string;
  count: number;
}

/**
 * Database connection manager.
 * Relative paths resolve against the working directory; `:memory:` opens a private in-memory database.
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = 'data/research.db') {
    if (dbPath === IN_MEMORY_DATABASE) {
      this.dbPath = IN_MEMORY_DATABASE;
      this.db = new Database(IN_MEMORY_DATABASE);
    } else {
      this.dbPath = path.resolve(process.cwd(), dbPath);

      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }

      this.db = new Database(this.dbPath);
      this.db.pragma('journal_mode = WAL');
    }

    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS research_jobs (
        id TEXT PRIMARY KEY,
        query TEXT NOT NULL,
        sources TEXT NOT NULL,
        num_results INTEGER NOT NULL,
        llm_provider TEXT,
        model TEXT,
        status TEXT NOT NULL,
        progress INTEGER NOT NULL DEFAULT 0,
        raw_data TEXT,
        report TEXT,
        error TEXT,
        skipped_sources TEXT NOT NULL DEFAULT '[]',
        backend_errors TEXT NOT NULL DEFAULT '[]',
        created_at TEXT NOT NULL,
        started_at TEXT,
        completed_at TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_research_job_status ON research_jobs(status);
      CREATE INDEX IF NOT EXISTS idx_research_job_created ON research_jobs(created_at);

      CREATE TABLE IF NOT EXISTS research_job_progress (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        job_id TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        status TEXT NOT NULL,
        progress INTEGER NOT NULL,
        message TEXT NOT NULL,
        FOREIGN KEY (job_id) REFERENCES research_jobs(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_research_job_progress_id ON research_job_progress(job_id);
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
    const total = this.db.prepare<[], CountRow>('SELECT COUNT(*) as count FROM research_jobs').get();
    const rows = this.db
      .prepare<[], StatusCountRow>('SELECT status, COUNT(*) as count FROM research_jobs GROUP BY status')
      .all();

    const jobStats: Record<JobStatus, number> = {
      queued: 0,
      researching: 0,
      generating: 0,
      completed: 0,
      failed: 0,
    };
    for (const row of rows) {
      if (isJobStatus(row.status)) {
        jobStats[row.status] = row.count;
      }
    }

    return {
      totalJobs: total?.count ?? 0,
      databaseSize: this.getFileSize(),
      jobStats,
    };
  }

  private getFileSize(): number {
    if (this.dbPath === IN_MEMORY_DATABASE || !fs.existsSync(this.dbPath)) {
      return 0;
    }
    return fs.statSync(this.dbPath).size;
  }
}
