/**
 * Durable state: one serialized container per cache kind, plus the
 * per-user cooldowns of the admin controls.
 */
export interface StoredContainer {
  kind: string;
  version: number;
  /** JSON text of the container */
  data: string;
  savedAt: string;
}

export interface UserCooldown {
  userId: string;
  /** e.g. "purge:images" or "gather" */
  action: string;
  /** Epoch milliseconds of the last use */
  usedAt: number;
}

/**
 * CacheRepository: abstract interface for persistence.
 * Implement this for SQLite or any other backend.
 */
export interface CacheRepository {
  /** Initialize the database (create tables, etc.) */
  init(): void;

  /** The stored container for a kind, or null if none was saved */
  getContainer(kind: string): StoredContainer | null;

  /** Write several containers atomically */
  saveContainers(containers: { kind: string; version: number; data: string }[]): void;

  getCooldowns(): UserCooldown[];

  setCooldown(cooldown: UserCooldown): void;

  close(): void;
}
