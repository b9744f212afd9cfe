import type { LocationSample } from '../types/location';
import { PLAYER_HISTORY_LENGTH } from './constants';

export interface PlayerHistoryOptions {
  /** Samples kept per player. Defaults to 10. */
  maxSamples?: number;
  /** Players tracked at once; the least recently seen is dropped first. */
  maxPlayers?: number;
  /** Players with no new sample for this long are forgotten. */
  idleTtlMs?: number;
  clock?: () => number;
}

interface HistoryEntry {
  samples: LocationSample[];
  lastSeen: number;
}

/**
 * Recent location samples per player, in arrival order.
 *
 * Owned by whoever constructs it (one per Lambda container in production,
 * one per test). Entries are created on the first sample and kept in a Map
 * ordered by last activity, so the oldest entries are always at the front:
 * both the LRU bound and the idle TTL evict from there.
 *
 * All methods are synchronous; an append and its evictions complete within a
 * single turn of the event loop.
 */
export class PlayerHistory {
  private readonly entries = new Map<string, HistoryEntry>();
  private readonly maxSamples: number;
  private readonly maxPlayers: number;
  private readonly idleTtlMs: number;
  private readonly clock: () => number;

  constructor(options: PlayerHistoryOptions = {}) {
    this.maxSamples = options.maxSamples ?? PLAYER_HISTORY_LENGTH;
    this.maxPlayers = options.maxPlayers ?? 10000;
    this.idleTtlMs = options.idleTtlMs ?? 60 * 60 * 1000;
    this.clock = options.clock ?? Date.now;
  }

  /** Number of players currently tracked */
  get size(): number {
    return this.entries.size;
  }

  append(playerId: string, sample: LocationSample): void {
    const now = this.clock();
    const existing = this.entries.get(playerId);
    const samples = existing && !this.isExpired(existing, now) ? existing.samples : [];

    samples.push(sample);
    if (samples.length > this.maxSamples) {
      samples.splice(0, samples.length - this.maxSamples);
    }

    // Re-insert so this player moves to the back of the iteration order
    this.entries.delete(playerId);
    this.entries.set(playerId, { samples, lastSeen: now });
    this.evict(now);
  }

  /** The player's last `count` samples, oldest first */
  recent(playerId: string, count: number): LocationSample[] {
    if (count <= 0) return [];
    const entry = this.entries.get(playerId);
    if (!entry) return [];
    if (this.isExpired(entry, this.clock())) {
      this.entries.delete(playerId);
      return [];
    }
    return entry.samples.slice(-count);
  }

  clear(playerId: string): void {
    this.entries.delete(playerId);
  }

  clearAll(): void {
    this.entries.clear();
  }

  private isExpired(entry: HistoryEntry, now: number): boolean {
    return now - entry.lastSeen > this.idleTtlMs;
  }

  private evict(now: number): void {
    for (const [playerId, entry] of this.entries) {
      if (this.entries.size > this.maxPlayers || this.isExpired(entry, now)) {
        this.entries.delete(playerId);
      } else {
        break;
      }
    }
  }
}
