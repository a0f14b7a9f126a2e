import { ChunkResult } from '../entities/Job.js';

/**
 * Interface for chunk result storage read by graph construction
 */
export interface IResultRepository {
  saveResults(jobId: string, results: ChunkResult[]): void;

  loadResults(jobId: string): ChunkResult[];

  deleteResults(jobId: string): number;
}
