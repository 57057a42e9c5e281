import { Writable } from 'node:stream';

/** Collects everything written to it, for asserting on log output. */
export class MemoryWritable extends Writable {
  public chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    this.chunks.push(chunk.toString());
    callback();
  }

  toString() {
    return this.chunks.join('');
  }

  lines(): string[] {
    return this.toString().split('\n').filter((line) => line.length > 0);
  }
}
