import { createInterface } from "node:readline";

/** Destroy a daemon response stream if it supports it; dockerode hands back IncomingMessage instances. */
export function destroyStream(stream: NodeJS.ReadableStream): void {
  if ("destroy" in stream && typeof stream.destroy === "function") {
    stream.destroy();
  }
}

/**
 * Iterate the non-empty lines of a newline-delimited stream (stats, pull
 * progress). Iteration ends when the stream ends, the signal aborts, or the
 * consumer stops; the underlying stream is destroyed in every case.
 */
export async function* readLines(stream: NodeJS.ReadableStream, signal?: AbortSignal): AsyncGenerator<string> {
  const rl = createInterface({ input: stream, crlfDelay: Infinity });
  const onAbort = () => {
    rl.close();
    destroyStream(stream);
  };

  if (signal?.aborted) {
    onAbort();
    return;
  }
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    for await (const line of rl) {
      if (signal?.aborted) return;
      if (line.trim().length > 0) yield line;
    }
  } finally {
    signal?.removeEventListener("abort", onAbort);
    rl.close();
    destroyStream(stream);
  }
}
