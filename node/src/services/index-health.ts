// Whether the in-memory indexes may serve queries. Corruption sticks until an explicit rebuild.
import { IndexCorruptionError } from './errors';
import { logger } from './logger';

export type IndexHealthStatus = 'healthy' | 'corrupted';

export class IndexHealth {
  private status: IndexHealthStatus = 'healthy';
  private reason: string | null = null;

  getCurrent(): { status: IndexHealthStatus; reason: string | null } {
    return { status: this.status, reason: this.reason };
  }

  isCorrupted(): boolean {
    return this.status === 'corrupted';
  }

  markCorrupted(reason: string): void {
    if (this.status !== 'corrupted') {
      logger.error('index-health:corrupted', { reason });
    }
    this.status = 'corrupted';
    this.reason = reason;
  }

  /** Throws while corrupted. */
  assertServing(): void {
    if (this.status === 'corrupted') {
      throw new IndexCorruptionError(`Index is corrupted (${this.reason ?? 'unknown'}); rebuild required`);
    }
  }

  /** Only a rebuild (clear + re-ingest) calls this. */
  reset(): void {
    if (this.status === 'corrupted') {
      logger.info('index-health:reset', { previousReason: this.reason });
    }
    this.status = 'healthy';
    this.reason = null;
  }
}
