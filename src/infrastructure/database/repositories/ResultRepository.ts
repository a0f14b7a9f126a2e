import Database from 'better-sqlite3';
import { ChunkFailureReason, ChunkResult } from '../../../core/entities/Job.js';
import { parseObservations } from '../../../core/entities/Observation.js';
import { IResultRepository } from '../../../core/interfaces/IResultRepository.js';

interface ChunkResultRow {
  job_id: string;
  chunk_index: number;
  status: string;
  content: string | null;
  server: string | null;
  attempts: number;
  latency_ms: number | null;
  reason: string | null;
  error: string | null;
}

const FAILURE_REASONS: readonly ChunkFailureReason[] = ['exhausted', 'no-capacity', 'cancelled'];

function toFailureReason(value: string | null): ChunkFailureReason {
  const match = FAILURE_REASONS.find((reason) => reason === value);
  return match ?? 'exhausted';
}

/**
 * SQLite implementation of chunk result storage
 */
export class ResultRepository implements IResultRepository {
  constructor(private db: Database.Database) {}

  saveResults(jobId: string, results: ChunkResult[]): void {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO chunk_results
        (job_id, chunk_index, status, content, server, attempts, latency_ms, reason, error, observations_count)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const insertAll = this.db.transaction((rows: ChunkResult[]) => {
      for (const result of rows) {
        if (result.status === 'succeeded') {
          stmt.run(
            jobId,
            result.index,
            result.status,
            result.content,
            result.server,
            result.attempts,
            result.latencyMs,
            null,
            null,
            parseObservations(result.content).length
          );
        } else {
          stmt.run(
            jobId,
            result.index,
            result.status,
            null,
            null,
            result.attempts,
            null,
            result.reason,
            result.error,
            0
          );
        }
      }
    });

    insertAll(results);
  }

  loadResults(jobId: string): ChunkResult[] {
    const rows = this.db
      .prepare('SELECT * FROM chunk_results WHERE job_id = ? ORDER BY chunk_index')
      .all(jobId) as ChunkResultRow[];

    return rows.map((row): ChunkResult =>
      row.status === 'succeeded'
        ? {
            index: row.chunk_index,
            status: 'succeeded',
            content: row.content ?? '',
            server: row.server ?? '',
            attempts: row.attempts,
            latencyMs: row.latency_ms ?? 0,
          }
        : {
            index: row.chunk_index,
            status: 'failed',
            reason: toFailureReason(row.reason),
            error: row.error ?? '',
            attempts: row.attempts,
          }
    );
  }

  deleteResults(jobId: string): number {
    return this.db.prepare('DELETE FROM chunk_results WHERE job_id = ?').run(jobId).changes;
  }
}
