/**
 * Windowed rendering for long message lists. Only rows inside the viewport plus an overscan
 * margin are materialized; spacers stand in for the rest so scroll height stays right.
 */

export const DEFAULT_ESTIMATED_ROW_HEIGHT = 156;
export const DEFAULT_OVERSCAN = 6;
export const MIN_ROW_HEIGHT = 56;
/** Measurements averaging at or below this are treated as layout noise. */
const MIN_MEASURED_AVG = 32;

export interface ViewportMetrics {
  scrollTop: number;
  viewportHeight: number;
}

export interface RenderWindow {
  /** Inclusive. */
  start: number;
  /** Exclusive. */
  end: number;
  beforeHeight: number;
  afterHeight: number;
}

/**
 * start = max(0, floor(s/h) - overscan); end = min(N, start + ceil(H/h) + 2*overscan).
 * A zero viewport counts as one pixel so at least one row is rendered.
 */
export function computeRenderWindow(
  total: number,
  rowHeight: number,
  viewport: ViewportMetrics,
  overscan: number = DEFAULT_OVERSCAN
): RenderWindow {
  if (total <= 0 || rowHeight <= 0) return { start: 0, end: 0, beforeHeight: 0, afterHeight: 0 };
  const viewportHeight = viewport.viewportHeight || 1;
  const scrollTop = Math.max(0, viewport.scrollTop || 0);
  const start = Math.min(total, Math.max(0, Math.floor(scrollTop / rowHeight) - overscan));
  const visibleCount = Math.ceil(viewportHeight / rowHeight) + overscan * 2;
  const end = Math.min(total, start + visibleCount);
  return {
    start,
    end,
    beforeHeight: start * rowHeight,
    afterHeight: Math.max(0, (total - end) * rowHeight),
  };
}

/** h' = 0.6*h + 0.4*avg(measured). Implausible averages leave the estimate unchanged. */
export function smoothRowHeight(current: number, measuredHeights: readonly number[]): number {
  if (measuredHeights.length === 0) return current;
  const avg = measuredHeights.reduce((acc, h) => acc + h, 0) / measuredHeights.length;
  if (!Number.isFinite(avg) || avg <= MIN_MEASURED_AVG) return current;
  return current * 0.6 + avg * 0.4;
}

export interface VirtualListOptions {
  estimatedRowHeight?: number;
  overscan?: number;
  emptyMarkup?: string;
}

export interface VirtualRender {
  markup: string;
  window: RenderWindow;
  /** False when the markup equals the previous render and nothing forced a rebuild. */
  changed: boolean;
}

const DEFAULT_EMPTY_MARKUP = '<div class="virtual-empty">No messages found</div>';

export class VirtualList<T> {
  private items: readonly T[] = [];
  private estimatedRowHeight: number;
  private readonly overscan: number;
  private readonly emptyMarkup: string;
  private lastMarkup: string | null = null;
  private rebuild = true;

  constructor(
    private readonly renderRow: (item: T, index: number) => string,
    options: VirtualListOptions = {}
  ) {
    this.estimatedRowHeight = options.estimatedRowHeight ?? DEFAULT_ESTIMATED_ROW_HEIGHT;
    this.overscan = options.overscan ?? DEFAULT_OVERSCAN;
    this.emptyMarkup = options.emptyMarkup ?? DEFAULT_EMPTY_MARKUP;
  }

  get rowHeight(): number {
    return Math.max(this.estimatedRowHeight, MIN_ROW_HEIGHT);
  }

  get size(): number {
    return this.items.length;
  }

  /** New filtered set or sort order. Forces the next render. */
  setItems(items: readonly T[]): void {
    this.items = items;
    this.rebuild = true;
  }

  /** Fold measured row heights into the estimate. Forces the next render when it moves. */
  measure(heights: readonly number[]): void {
    const next = smoothRowHeight(this.estimatedRowHeight, heights);
    if (next !== this.estimatedRowHeight) {
      this.estimatedRowHeight = next;
      this.rebuild = true;
    }
  }

  /** Item indexes a render would materialize for this viewport. */
  window(viewport: ViewportMetrics): RenderWindow {
    return computeRenderWindow(this.items.length, this.rowHeight, viewport, this.overscan);
  }

  render(viewport: ViewportMetrics, force: boolean = false): VirtualRender {
    const win = this.window(viewport);
    let markup: string;
    if (this.items.length === 0) {
      markup = this.emptyMarkup;
    } else {
      const rows: string[] = [];
      for (let idx = win.start; idx < win.end; idx++) {
        rows.push(this.renderRow(this.items[idx], idx));
      }
      markup =
        `<div class="virtual-spacer" style="height:${win.beforeHeight}px"></div>` +
        rows.join('') +
        `<div class="virtual-spacer" style="height:${win.afterHeight}px"></div>`;
    }
    const changed = force || this.rebuild || markup !== this.lastMarkup;
    this.lastMarkup = markup;
    this.rebuild = false;
    return { markup, window: win, changed };
  }
}
