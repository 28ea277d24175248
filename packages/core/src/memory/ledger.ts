import type { MemoryEntry } from '@insights/shared';
import type { MemoryRepository } from '@insights/store';

export const DEFAULT_CANDIDATE_LIMIT = 300;

/**
 * Append-only per-user memory records. Blank text is dropped;
 * everything else is stored trimmed, duplicates included.
 */
export class MemoryLedger {
  constructor(
    private memories: MemoryRepository,
    private clock: () => Date = () => new Date(),
  ) {}

  append(ownerId: number, text: string): MemoryEntry | null {
    const trimmed = text.trim();
    if (!trimmed) return null;
    return this.memories.insert(ownerId, trimmed, this.clock().toISOString());
  }

  fetchRecentCandidates(ownerId: number, limit: number = DEFAULT_CANDIDATE_LIMIT): MemoryEntry[] {
    return this.memories.recentForOwner(ownerId, limit);
  }

  count(ownerId: number): number {
    return this.memories.countForOwner(ownerId);
  }
}
