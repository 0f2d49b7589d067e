/**
 * At most one running task per vocabulary version.
 */
import { ConcurrencyConflictError } from "./exceptions.js";

export class VersionRunGuard {
  private active = new Set<string>();

  private key(vocabularyId: string, versionId: string): string {
    return JSON.stringify([vocabularyId, versionId]);
  }

  /** Claim the version, or throw ConcurrencyConflictError if it is taken. */
  acquire(vocabularyId: string, versionId: string): void {
    const key = this.key(vocabularyId, versionId);
    if (this.active.has(key)) {
      throw new ConcurrencyConflictError(vocabularyId, versionId);
    }
    this.active.add(key);
  }

  release(vocabularyId: string, versionId: string): void {
    this.active.delete(this.key(vocabularyId, versionId));
  }

  isRunning(vocabularyId: string, versionId: string): boolean {
    return this.active.has(this.key(vocabularyId, versionId));
  }

  get size(): number {
    return this.active.size;
  }
}
