import type { ArtifactKey, ArtifactMap } from './types';
import { MissingArtifactError } from './errors';

/**
 * Keyed artifact map for one planning run
 *
 * Each key has exactly one writer; later stages only read. Writing a key that a
 * different writer already owns is a programming fault and throws.
 */
export class ContextStore {
  private artifacts: Partial<ArtifactMap> = {};
  private writers = new Map<ArtifactKey, string>();

  get<K extends ArtifactKey>(key: K): ArtifactMap[K] | undefined {
    return this.artifacts[key];
  }

  /**
   * Read an artifact a stage gate has already confirmed
   */
  require<K extends ArtifactKey>(key: K): ArtifactMap[K] {
    const value = this.artifacts[key];
    if (value === undefined) {
      throw new MissingArtifactError([key]);
    }
    return value;
  }

  has(key: ArtifactKey): boolean {
    return this.artifacts[key] !== undefined;
  }

  /**
   * True when the key is unowned or already owned by this writer
   */
  canWrite(key: ArtifactKey, writer: string): boolean {
    const owner = this.writers.get(key);
    return owner === undefined || owner === writer;
  }

  set<K extends ArtifactKey>(key: K, value: ArtifactMap[K], writer = 'external'): void {
    if (!this.canWrite(key, writer)) {
      const owner = this.writers.get(key);
      throw new Error(`Artifact "${key}" is owned by ${owner}; ${writer} cannot overwrite it`);
    }
    this.artifacts[key] = value;
    this.writers.set(key, writer);
  }

  delete(key: ArtifactKey): void {
    delete this.artifacts[key];
    this.writers.delete(key);
  }

  keys(): ArtifactKey[] {
    return [...this.writers.keys()];
  }

  writerOf(key: ArtifactKey): string | undefined {
    return this.writers.get(key);
  }
}
