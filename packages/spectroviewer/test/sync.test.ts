import { describe, expect, it } from "vitest";

import { ViewportSync, type SyncableChart, type Viewport, type ViewportListener } from "../src/index";

/** Chart stand-in that echoes every viewport it is given to its listeners */
class EchoChart implements SyncableChart {
  readonly listeners = new Set<ViewportListener>();
  viewport: Viewport | null = null;
  applied = 0;

  constructor(readonly id: string) {}

  setViewport(start: number, end: number): void {
    this.viewport = { start, end };
    this.applied++;
    for (const listener of this.listeners) listener(start, end);
  }

  onViewportChange(listener: ViewportListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

describe("ViewportSync", () => {
  it("applies a change to every other chart exactly once", () => {
    const sync = new ViewportSync();
    const [a, b, c] = [new EchoChart("a"), new EchoChart("b"), new EchoChart("c")];
    sync.register(a);
    sync.register(b);
    sync.register(c);

    a.setViewport(0, 120_000);

    expect(a.applied).toBe(1);
    expect(b.applied).toBe(1);
    expect(c.applied).toBe(1);
    expect(b.viewport).toEqual({ start: 0, end: 120_000 });
    expect(c.viewport).toEqual({ start: 0, end: 120_000 });
  });

  it("clamps propagated viewports to the minimum width", () => {
    const sync = new ViewportSync({ minViewportMs: 10_000 });
    const a = new EchoChart("a");
    const b = new EchoChart("b");
    sync.register(a);
    sync.register(b);

    a.setViewport(5_000, 6_000);

    expect(b.viewport).toEqual({ start: 500, end: 10_500 });
    expect(sync.viewport).toEqual({ start: 500, end: 10_500 });
    expect(a.viewport).toEqual({ start: 500, end: 10_500 });
    expect(a.applied).toBe(2);
    expect(b.applied).toBe(1);
  });

  it("hands the current viewport to charts registered later", () => {
    const sync = new ViewportSync();
    const a = new EchoChart("a");
    const b = new EchoChart("b");
    sync.register(a);
    a.setViewport(0, 300_000);

    sync.register(b);

    expect(b.viewport).toEqual({ start: 0, end: 300_000 });
    expect(a.applied).toBe(1);
  });

  it("stops syncing a chart once unregistered", () => {
    const sync = new ViewportSync();
    const a = new EchoChart("a");
    const b = new EchoChart("b");
    sync.register(a);
    const unregister = sync.register(b);

    unregister();
    a.setViewport(0, 120_000);
    b.setViewport(0, 240_000);

    expect(b.applied).toBe(1);
    expect(a.viewport).toEqual({ start: 0, end: 120_000 });
    expect(b.listeners.size).toBe(0);
    expect(sync.size).toBe(1);
  });

  it("drives every chart from an external change and notifies subscribers", () => {
    const sync = new ViewportSync();
    const a = new EchoChart("a");
    const b = new EchoChart("b");
    sync.register(a);
    sync.register(b);
    const seen: [Viewport, string | null][] = [];
    const unsubscribe = sync.subscribe((viewport, sourceId) => seen.push([viewport, sourceId]));

    sync.setViewport(60_000, 180_000);
    b.setViewport(0, 90_000);
    unsubscribe();
    a.setViewport(0, 120_000);

    expect(a.viewport).toEqual({ start: 0, end: 120_000 });
    expect(b.viewport).toEqual({ start: 0, end: 120_000 });
    expect(seen).toEqual([
      [{ start: 60_000, end: 180_000 }, null],
      [{ start: 0, end: 90_000 }, "b"],
    ]);
  });

  it("ignores degenerate ranges", () => {
    const sync = new ViewportSync();
    const a = new EchoChart("a");
    sync.register(a);

    sync.setViewport(100, 100);
    sync.setViewport(Number.NaN, 100);

    expect(a.applied).toBe(0);
    expect(sync.viewport).toBeNull();
  });

  it("releases every chart on dispose", () => {
    const sync = new ViewportSync();
    const a = new EchoChart("a");
    sync.register(a);

    sync.dispose();

    expect(sync.size).toBe(0);
    expect(a.listeners.size).toBe(0);
  });
});
