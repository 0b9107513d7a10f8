import * as fs from 'fs';
import { StringDecoder } from 'string_decoder';

/** Where `display` and friends write. */
export interface OutputSink {
  write(text: string): void;
  flush?(): void;
}

/** Where `readline` reads from. `null` means end of input. */
export interface InputSource {
  readLine(): string | null;
}

export const stdoutSink: OutputSink = {
  write(text: string): void {
    process.stdout.write(text);
  },
};

export const stderrSink: OutputSink = {
  write(text: string): void {
    process.stderr.write(text);
  },
};

/**
 * Blocking line reader over file descriptor 0. The evaluator is synchronous,
 * so `readline` cannot wait on a stream.
 */
export class StdinSource implements InputSource {
  private pending = '';
  private done = false;
  private decoder = new StringDecoder('utf8');

  readLine(): string | null {
    const buf = Buffer.alloc(4096);
    while (!this.pending.includes('\n') && !this.done) {
      const n = fs.readSync(0, buf, 0, buf.length, null);
      if (n === 0) {
        this.done = true;
        this.pending += this.decoder.end();
      } else {
        this.pending += this.decoder.write(buf.subarray(0, n));
      }
    }

    const newline = this.pending.indexOf('\n');
    if (newline < 0) {
      if (this.pending.length === 0) return null;
      const rest = this.pending;
      this.pending = '';
      return rest;
    }
    const line = this.pending.slice(0, newline).replace(/\r$/, '');
    this.pending = this.pending.slice(newline + 1);
    return line;
  }
}

/** In-memory sink, used by tests and by embedders that want the output as a string. */
export class BufferSink implements OutputSink {
  private chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  text(): string {
    return this.chunks.join('');
  }

  clear(): void {
    this.chunks = [];
  }
}

/** Serves a fixed list of lines to `readline`. */
export class LineSource implements InputSource {
  private lines: string[];

  constructor(lines: string[]) {
    this.lines = [...lines];
  }

  readLine(): string | null {
    return this.lines.shift() ?? null;
  }
}
