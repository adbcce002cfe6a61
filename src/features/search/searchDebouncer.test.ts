import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SearchDebouncer } from './searchDebouncer';

describe('SearchDebouncer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs only the last query once input settles', () => {
    const run = vi.fn();
    const debouncer = new SearchDebouncer(run, 140);
    debouncer.input('d');
    vi.advanceTimersByTime(100);
    debouncer.input('de');
    vi.advanceTimersByTime(100);
    debouncer.input('dep');
    expect(run).not.toHaveBeenCalled();
    vi.advanceTimersByTime(139);
    expect(run).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith('dep');
    expect(debouncer.pending).toBe(false);
  });

  it('flushes the pending query immediately', () => {
    const run = vi.fn();
    const debouncer = new SearchDebouncer(run);
    debouncer.input('alpha');
    expect(debouncer.pending).toBe(true);
    debouncer.flush();
    expect(run).toHaveBeenCalledWith('alpha');
    vi.advanceTimersByTime(500);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('does nothing on flush or after cancel when idle', () => {
    const run = vi.fn();
    const debouncer = new SearchDebouncer(run);
    debouncer.flush();
    debouncer.input('x');
    debouncer.cancel();
    vi.advanceTimersByTime(500);
    expect(run).not.toHaveBeenCalled();
  });
});
