export const DEFAULT_PAGE_NUMBER = 1;
export const DEFAULT_PAGE_SIZE = 10;

export interface PageWindow {
  pageNumber: number;
  pageSize: number;
  offset: number;
  limit: number;
}

/**
 * 1-based page; non-positive values fall back to the defaults
 */
export const resolvePage = (pageNumber: number, pageSize: number): PageWindow => {
  const page = pageNumber > 0 ? pageNumber : DEFAULT_PAGE_NUMBER;
  const size = pageSize > 0 ? pageSize : DEFAULT_PAGE_SIZE;

  return {
    pageNumber: page,
    pageSize: size,
    offset: (page - 1) * size,
    limit: size,
  };
};

export interface RecordSink<T> {
  // resolves once the transport accepted the item
  write(item: T): Promise<void>;
}

export interface StreamSummary {
  delivered: number;
  cancelled: boolean;
}

/**
 * Emit records one at a time. The signal is checked before every item; once it is
 * aborted the stream stops and what was already delivered is the response.
 */
export const streamRecords = async <R, T>(
  records: readonly R[],
  map: (record: R) => T,
  sink: RecordSink<T>,
  signal: AbortSignal
): Promise<StreamSummary> => {
  let delivered = 0;

  for (const record of records) {
    if (signal.aborted) {
      return { delivered, cancelled: true };
    }

    await sink.write(map(record));
    delivered++;
  }

  return { delivered, cancelled: false };
};
