import type { Axis, PatternCatalog, PatternRule } from '../types';
import { createLogger } from '../util/logger';
import { loadCatalog, loadCatalogFile } from './loadCatalog';

export type ReloadListener = (next: PatternCatalog, previous: PatternCatalog) => void;

const logger = createLogger('Catalog');

/**
 * Holds the active catalog snapshot. Readers take `current()` once per
 * analysis; reload compiles a complete snapshot first and swaps the
 * reference in a single assignment, so a failed load leaves the previous
 * catalog active.
 */
export class CatalogHandle {
  private active: PatternCatalog;
  private listeners = new Set<ReloadListener>();

  constructor(initial: PatternCatalog) {
    this.active = initial;
  }

  static fromFile(file: string): CatalogHandle {
    return new CatalogHandle(loadCatalogFile(file));
  }

  current(): PatternCatalog {
    return this.active;
  }

  rulesFor(axis: Axis): readonly PatternRule[] {
    return this.active.rulesFor(axis);
  }

  reload(raw: unknown): PatternCatalog {
    return this.swap(loadCatalog(raw));
  }

  reloadFromFile(file: string): PatternCatalog {
    return this.swap(loadCatalogFile(file));
  }

  /** Returns an unsubscribe function. */
  onReload(listener: ReloadListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  private swap(next: PatternCatalog): PatternCatalog {
    const previous = this.active;
    this.active = next;
    logger.info(`Catalog ${previous.version} -> ${next.version} (${next.rules.length} rules)`);
    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (error) {
        logger.error('Reload listener failed:', error);
      }
    }
    return next;
  }
}
