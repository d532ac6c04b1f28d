import { describe, expect, it, vi } from 'vitest';
import { resolvePage, streamRecords } from '../src/modules/products/products.pager';
import type { RecordSink } from '../src/modules/products/products.pager';

const recordingSink = (onWrite?: (item: string, count: number) => void) => {
  const items: string[] = [];
  const sink: RecordSink<string> = {
    async write(item) {
      items.push(item);
      onWrite?.(item, items.length);
    },
  };
  return { items, sink };
};

describe('resolvePage', () => {
  it('computes offset and limit from a 1-based page', () => {
    expect(resolvePage(3, 20)).toEqual({ pageNumber: 3, pageSize: 20, offset: 40, limit: 20 });
  });

  it('falls back to page 1 of size 10 for zero values', () => {
    expect(resolvePage(0, 0)).toEqual({ pageNumber: 1, pageSize: 10, offset: 0, limit: 10 });
  });

  it('falls back independently per field', () => {
    expect(resolvePage(0, 5)).toEqual({ pageNumber: 1, pageSize: 5, offset: 0, limit: 5 });
    expect(resolvePage(2, 0)).toEqual({ pageNumber: 2, pageSize: 10, offset: 10, limit: 10 });
  });
});

describe('streamRecords', () => {
  it('maps and delivers every record in order', async () => {
    const { items, sink } = recordingSink();

    const summary = await streamRecords([1, 2, 3], (n) => `item-${n}`, sink, new AbortController().signal);

    expect(summary).toEqual({ delivered: 3, cancelled: false });
    expect(items).toEqual(['item-1', 'item-2', 'item-3']);
  });

  it('stops before the next record once the signal is aborted', async () => {
    const controller = new AbortController();
    const { items, sink } = recordingSink((_item, count) => {
      if (count === 2) controller.abort();
    });

    const summary = await streamRecords([1, 2, 3, 4], String, sink, controller.signal);

    expect(summary).toEqual({ delivered: 2, cancelled: true });
    expect(items).toEqual(['1', '2']);
  });

  it('delivers nothing when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const map = vi.fn((n: number) => String(n));
    const { items, sink } = recordingSink();

    expect(await streamRecords([1, 2], map, sink, controller.signal)).toEqual({ delivered: 0, cancelled: true });
    expect(items).toEqual([]);
    expect(map).not.toHaveBeenCalled();
  });

  it('reports an empty page as a completed stream', async () => {
    const { sink } = recordingSink();

    expect(await streamRecords([], String, sink, new AbortController().signal)).toEqual({
      delivered: 0,
      cancelled: false,
    });
  });
});
