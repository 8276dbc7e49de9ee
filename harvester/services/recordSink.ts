import fs, { type FileHandle } from 'fs/promises';
import path from 'path';
import {
  FILE_SUFFIX,
  MARCXML_CLOSING_ELEMENTS,
  MARCXML_OPENING_ELEMENTS,
  encodeRecord,
  type MarcRecord,
  type OutputFormat,
} from '../../utils/marc';
import type { RecordSink, SinkFactory } from '../types';

/**
 * Appends encoded records to one output file. MARCXML output is wrapped in a
 * single <collection>; binary MARC is written record after record.
 */
export class MarcFileSink implements RecordSink {
  private count = 0;
  private closed = false;

  private constructor(
    readonly path: string,
    private readonly format: OutputFormat,
    private readonly handle: FileHandle,
  ) {}

  static async open(filePath: string, format: OutputFormat): Promise<MarcFileSink> {
    const handle = await fs.open(filePath, 'w');
    const sink = new MarcFileSink(filePath, format, handle);
    if (format === 'marcxml') {
      await handle.write(MARCXML_OPENING_ELEMENTS);
    }
    return sink;
  }

  get written(): number {
    return this.count;
  }

  async write(record: MarcRecord): Promise<void> {
    if (this.closed) {
      throw new Error(`Output file ${this.path} is already closed`);
    }
    await this.handle.write(encodeRecord(record, this.format));
    this.count += 1;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      if (this.format === 'marcxml') {
        await this.handle.write(MARCXML_CLOSING_ELEMENTS);
      }
    } finally {
      await this.handle.close();
    }
  }
}

export const fileSinkFactory =
  (directory: string): SinkFactory =>
  (fileStem, format) =>
    MarcFileSink.open(path.join(directory, `${fileStem}${FILE_SUFFIX[format]}`), format);
