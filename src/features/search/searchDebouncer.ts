/**
 * Search input debounce. Each keystroke cancels the pending run and restarts the timer.
 * Results are applied in completion order: whichever evaluation finishes last owns the view.
 */

export const DEFAULT_SEARCH_DEBOUNCE_MS = 140;

export class SearchDebouncer {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private pendingQuery: string | null = null;

  constructor(
    private readonly run: (query: string) => void,
    private readonly delayMs: number = DEFAULT_SEARCH_DEBOUNCE_MS
  ) {}

  /** Schedule `query`; replaces any pending query. */
  input(query: string): void {
    this.cancel();
    this.pendingQuery = query;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.pendingQuery = null;
      this.run(query);
    }, this.delayMs);
  }

  /** Run a pending query now. No-op when nothing is pending. */
  flush(): void {
    const query = this.pendingQuery;
    if (query === null) return;
    this.cancel();
    this.run(query);
  }

  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.pendingQuery = null;
  }

  get pending(): boolean {
    return this.timer !== null;
  }
}
