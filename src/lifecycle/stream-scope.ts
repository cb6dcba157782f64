/**
 * Tracks the live stats/log streams of a session. Opening a scope hands the
 * producer an AbortSignal; `cancelAll()` aborts every stream still open.
 * Aborting a stream only ends that stream.
 */
export class StreamScope {
  private readonly open = new Set<AbortController>();

  get size(): number {
    return this.open.size;
  }

  /**
   * Wrap a producer so it stops when the scope is cancelled or `external`
   * aborts. The stream is registered immediately, before the first read.
   */
  stream<T>(factory: (signal: AbortSignal) => AsyncIterable<T>, external?: AbortSignal): AsyncIterable<T> {
    const controller = new AbortController();
    this.open.add(controller);

    const onExternalAbort = () => controller.abort();
    if (external?.aborted) controller.abort();
    else external?.addEventListener("abort", onExternalAbort, { once: true });

    const release = () => {
      this.open.delete(controller);
      external?.removeEventListener("abort", onExternalAbort);
    };
    return scoped(factory(controller.signal), controller.signal, release);
  }

  /** Abort every open stream. Returns how many were open. */
  cancelAll(): number {
    const count = this.open.size;
    for (const controller of this.open) controller.abort();
    this.open.clear();
    return count;
  }
}

async function* scoped<T>(source: AsyncIterable<T>, signal: AbortSignal, release: () => void): AsyncGenerator<T> {
  try {
    if (signal.aborted) return;
    for await (const item of source) {
      if (signal.aborted) return;
      yield item;
    }
  } finally {
    release();
  }
}
