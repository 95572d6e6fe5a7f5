/**
 * Serving State
 *
 * Owner of "the model currently served". Readers take the snapshot
 * reference once and use it for the whole operation; `swap()` publishes a
 * replacement with a single reference assignment. Snapshots are frozen, so
 * a reader never sees a partially built one and nothing mutates a snapshot
 * after publication.
 *
 * Lifecycle: empty -> loaded -> loaded' (each successful reload). A failed
 * reload never reaches `swap()`, so there is no error state.
 */

import type { Classifier } from './model-loader.js';

export interface ServingSnapshot {
  readonly model: Classifier;
  readonly modelName: string;
  readonly version: number;
  readonly artifactRef: string;
  /** ms since epoch */
  readonly loadedAt: number;
}

export class ServingState {
  private current: ServingSnapshot | null = null;

  get(): ServingSnapshot | null {
    return this.current;
  }

  isLoaded(): boolean {
    return this.current !== null;
  }

  /**
   * Publish `next` and return the frozen snapshot now being served.
   */
  swap(next: ServingSnapshot): ServingSnapshot {
    const published = Object.freeze({ ...next });
    this.current = published;
    return published;
  }
}
