import { StringDecoder } from "node:string_decoder";
import type { LogLine } from "./types.js";

type LogSource = LogLine["source"];

const HEADER_SIZE = 8;

/**
 * Decodes the Engine API's multiplexed attach/logs stream into lines.
 *
 * Each frame is an 8-byte header `[stream, 0, 0, 0, size (uint32 BE)]`
 * followed by `size` bytes of payload; stream 2 is stderr, anything else is
 * treated as stdout. Containers created with a TTY send raw bytes instead, so
 * a first header that does not look like one switches the decoder to raw mode.
 *
 * Lines are emitted in arrival order across both sources. Partial lines are
 * held per source until their newline arrives or `end()` is called.
 */
export class LogFrameDecoder {
  private pending: Buffer = Buffer.alloc(0);
  private mode: "unknown" | "framed" | "raw" = "unknown";
  private readonly text: Record<LogSource, StringDecoder> = {
    stdout: new StringDecoder("utf8"),
    stderr: new StringDecoder("utf8"),
  };
  private readonly partial: Record<LogSource, string> = { stdout: "", stderr: "" };

  push(chunk: Buffer): LogLine[] {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);

    if (this.mode === "unknown") {
      if (this.pending.length < HEADER_SIZE) return [];
      this.mode = looksLikeHeader(this.pending) ? "framed" : "raw";
    }

    if (this.mode === "raw") {
      const data = this.pending;
      this.pending = Buffer.alloc(0);
      return this.appendText("stdout", data);
    }

    const { frames, rest } = splitFrames(this.pending);
    this.pending = rest;
    return frames.flatMap((frame) => this.appendText(frame.source, frame.payload));
  }

  /** Flush whatever is left. A truncated frame is dropped. */
  end(): LogLine[] {
    const lines: LogLine[] = [];
    if (this.mode !== "framed" && this.pending.length > 0) {
      lines.push(...this.appendText("stdout", this.pending));
    }
    this.pending = Buffer.alloc(0);

    for (const source of ["stdout", "stderr"] as const) {
      const rest = this.partial[source] + this.text[source].end();
      this.partial[source] = "";
      if (rest.length > 0) lines.push({ source, text: stripCr(rest) });
    }
    return lines;
  }

  private appendText(source: LogSource, bytes: Buffer): LogLine[] {
    const combined = this.partial[source] + this.text[source].write(bytes);
    const parts = combined.split("\n");
    this.partial[source] = parts.pop() ?? "";
    return parts.map((text) => ({ source, text: stripCr(text) }));
  }
}

export interface Frame {
  source: LogSource;
  payload: Buffer;
}

/** Split complete frames off the front of a buffer; `rest` holds a trailing partial frame. */
export function splitFrames(buf: Buffer): { frames: Frame[]; rest: Buffer } {
  const frames: Frame[] = [];
  let offset = 0;
  while (buf.length - offset >= HEADER_SIZE) {
    const size = buf.readUInt32BE(offset + 4);
    if (buf.length - offset < HEADER_SIZE + size) break;
    frames.push({
      source: buf[offset] === 2 ? "stderr" : "stdout",
      payload: buf.subarray(offset + HEADER_SIZE, offset + HEADER_SIZE + size),
    });
    offset += HEADER_SIZE + size;
  }
  return { frames, rest: buf.subarray(offset) };
}

function looksLikeHeader(buf: Buffer): boolean {
  return buf[0] <= 2 && buf[1] === 0 && buf[2] === 0 && buf[3] === 0;
}

function stripCr(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/** Decode a complete (non-follow) logs payload. */
export function decodeLogBuffer(buf: Buffer): LogLine[] {
  const decoder = new LogFrameDecoder();
  return [...decoder.push(buf), ...decoder.end()];
}
