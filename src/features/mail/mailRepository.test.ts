import { describe, it, expect, vi } from 'vitest';
import { MessageBodyRepository } from './mailRepository';

describe('MessageBodyRepository', () => {
  it('renders and caches bodies', async () => {
    const source = vi.fn((id: number) => `**body ${id}**`);
    const repo = new MessageBodyRepository(source);
    const body = await repo.fetchBody(7);
    expect(body.markdown).toBe('**body 7**');
    expect(body.html).toContain('<strong>body 7</strong>');
    expect(body.previewPlain).toBe('body 7');
    await repo.fetchBody(7);
    expect(source).toHaveBeenCalledTimes(1);
  });

  it('shares one fetch between concurrent callers', async () => {
    let release: (value: string) => void = () => {};
    const source = vi.fn(
      () =>
        new Promise<string>((resolve) => {
          release = resolve;
        })
    );
    const repo = new MessageBodyRepository(source);
    const first = repo.fetchBody(1);
    const second = repo.fetchBody(1);
    release('hello');
    const [a, b] = await Promise.all([first, second]);
    expect(a).toBe(b);
    expect(source).toHaveBeenCalledTimes(1);
  });

  it('expires entries after the TTL', async () => {
    let now = 0;
    const source = vi.fn(() => 'text');
    const repo = new MessageBodyRepository(source, { ttlMs: 1000, now: () => now });
    await repo.fetchBody(1);
    now = 1001;
    expect(repo.getCached(1)).toBeNull();
    await repo.fetchBody(1);
    expect(source).toHaveBeenCalledTimes(2);
  });

  it('evicts the least recently stored body', async () => {
    const repo = new MessageBodyRepository((id) => `m${id}`, { maxEntries: 2 });
    await repo.fetchBody(1);
    await repo.fetchBody(2);
    await repo.fetchBody(3);
    expect(repo.size).toBe(2);
    expect(repo.getCached(1)).toBeNull();
    expect(repo.getCached(3)?.markdown).toBe('m3');
  });

  it('propagates source failures without caching them', async () => {
    const source = vi.fn((): string => {
      throw new Error('no such table: messages');
    });
    const repo = new MessageBodyRepository(source);
    await expect(repo.fetchBody(1)).rejects.toThrow('no such table: messages');
    expect(repo.size).toBe(0);
  });
});
