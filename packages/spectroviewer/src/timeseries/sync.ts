/**
 * Viewport synchronization
 *
 * Keeps the time axis of several charts in lockstep. Only the time axis is
 * shared; every chart keeps scaling its own value axis.
 */

import { createStore, type StoreApi } from "zustand/vanilla";

import type { Viewport } from "../types.js";
import { DEFAULT_MIN_VIEWPORT_MS, enforceMinimumWidth, type ViewportListener } from "./chart.js";

/** What a chart must offer to take part in synchronization */
export interface SyncableChart {
  readonly id: string;
  setViewport(start: number, end: number): void;
  onViewportChange(listener: ViewportListener): () => void;
}

export interface ViewportSyncState {
  viewport: Viewport | null;
  /** Chart that caused the last change, or null for external changes */
  sourceId: string | null;
}

export interface ViewportSyncOptions {
  minViewportMs?: number;
}

export type SyncListener = (viewport: Viewport, sourceId: string | null) => void;

export class ViewportSync {
  private readonly charts = new Map<string, { chart: SyncableChart; unsubscribe: () => void }>();
  private readonly store: StoreApi<ViewportSyncState>;
  private readonly minViewportMs: number;
  private syncing = false;

  constructor(options: ViewportSyncOptions = {}) {
    this.minViewportMs = options.minViewportMs ?? DEFAULT_MIN_VIEWPORT_MS;
    this.store = createStore<ViewportSyncState>()(() => ({ viewport: null, sourceId: null }));
  }

  /** Last synchronized viewport */
  get viewport(): Viewport | null {
    return this.store.getState().viewport;
  }

  get size(): number {
    return this.charts.size;
  }

  /**
   * Add a chart. It adopts the current synchronized viewport, if any.
   * Returns a function that removes it again.
   */
  register(chart: SyncableChart): () => void {
    this.unregister(chart.id);

    const unsubscribe = chart.onViewportChange((start, end) => {
      this.propagate(chart.id, start, end);
    });
    this.charts.set(chart.id, { chart, unsubscribe });

    const current = this.viewport;
    if (current) this.apply(chart, current);

    return () => this.unregister(chart.id);
  }

  unregister(id: string): void {
    const entry = this.charts.get(id);
    if (!entry) return;
    entry.unsubscribe();
    this.charts.delete(id);
  }

  /**
   * Apply a viewport change from `sourceId` to every other registered chart.
   * When the minimum width widened the change, the source gets it too.
   *
   * Changes raised while a propagation is in flight are ignored, so a chart
   * echoing the viewport it was just given does not start another round.
   */
  propagate(sourceId: string | null, start: number, end: number): void {
    if (this.syncing || !Number.isFinite(start) || !Number.isFinite(end) || end <= start) return;

    const viewport = enforceMinimumWidth({ start, end }, this.minViewportMs);
    const widened = viewport.start !== start || viewport.end !== end;

    this.syncing = true;
    try {
      this.store.setState({ viewport, sourceId });
      for (const [id, { chart }] of this.charts) {
        if (id !== sourceId || widened) chart.setViewport(viewport.start, viewport.end);
      }
    } finally {
      this.syncing = false;
    }
  }

  /** Set the viewport of every chart from outside */
  setViewport(start: number, end: number): void {
    this.propagate(null, start, end);
  }

  /**
   * Listen for synchronized viewport changes, e.g. to refetch a window
   */
  subscribe(listener: SyncListener): () => void {
    return this.store.subscribe((state, prev) => {
      if (state.viewport && state.viewport !== prev.viewport) {
        listener(state.viewport, state.sourceId);
      }
    });
  }

  dispose(): void {
    for (const id of [...this.charts.keys()]) this.unregister(id);
  }

  private apply(chart: SyncableChart, viewport: Viewport): void {
    this.syncing = true;
    try {
      chart.setViewport(viewport.start, viewport.end);
    } finally {
      this.syncing = false;
    }
  }
}
