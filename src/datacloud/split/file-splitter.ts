import { createReadStream } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { TextDecoder } from 'node:util';
import { logger } from '../../shared/logger.js';
import { ValidationError } from '../../shared/errors.js';

export interface FilePart {
  /** Path of the written part file */
  path: string;
  /** Size in bytes, header included */
  size: number;
  /** 1-based position of this part within the source file */
  index: number;
  /** Data lines in this part, header excluded */
  lineCount: number;
}

export interface SplitFileOptions {
  maxBytes: number;
  tempDir: string;
  /** Encoding of the source file (default: utf-8). Parts are always UTF-8. */
  encoding?: string;
}

class PartWriter {
  private header: string | null = null;
  private headerBytes = 0;
  private lines: string[] = [];
  private size = 0;
  private index = 0;

  constructor(
    private readonly sourcePath: string,
    private readonly opts: SplitFileOptions,
  ) {}

  get hasHeader(): boolean {
    return this.header !== null;
  }

  /** Add one line (terminator included). Returns the part closed to make room, if any. */
  async add(line: string): Promise<FilePart | null> {
    if (line.trim() === '') return null;

    if (this.header === null) {
      this.header = line;
      this.headerBytes = Buffer.byteLength(line, 'utf8');
      this.size = this.headerBytes;
      return null;
    }

    const lineBytes = Buffer.byteLength(line, 'utf8');
    let closed: FilePart | null = null;

    if (this.lines.length > 0 && this.size + lineBytes > this.opts.maxBytes) {
      closed = await this.flush();
    }

    if (this.headerBytes + lineBytes > this.opts.maxBytes) {
      logger.warn(
        { file: this.sourcePath, lineBytes, maxBytes: this.opts.maxBytes },
        'Line exceeds the part size limit, writing an oversized part',
      );
    }

    this.lines.push(line);
    this.size += lineBytes;
    return closed;
  }

  async finish(): Promise<FilePart | null> {
    return this.lines.length > 0 ? this.flush() : null;
  }

  private async flush(): Promise<FilePart> {
    this.index += 1;
    const ext = path.extname(this.sourcePath) || '.csv';
    const base = path.basename(this.sourcePath, path.extname(this.sourcePath));
    const partPath = path.join(this.opts.tempDir, `${base}_${this.index}${ext}`);

    await writeFile(partPath, (this.header ?? '') + this.lines.join(''), 'utf8');

    const part: FilePart = {
      path: partPath,
      size: this.size,
      index: this.index,
      lineCount: this.lines.length,
    };
    this.lines = [];
    this.size = this.headerBytes;
    return part;
  }
}

/**
 * Split a CSV file into line-aligned UTF-8 part files of at most
 * `maxBytes` each, repeating the header line at the top of every part.
 *
 * Parts are written to `tempDir` as `<name>_<n><ext>` and yielded as soon as
 * they are complete; the caller owns them and removes them when done.
 */
export async function* splitCsvFile(
  filePath: string,
  opts: SplitFileOptions,
): AsyncGenerator<FilePart> {
  const encoding = opts.encoding ?? 'utf-8';
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding);
  } catch {
    throw new ValidationError(`Unsupported input file encoding: ${encoding}`);
  }

  await mkdir(opts.tempDir, { recursive: true });

  const writer = new PartWriter(filePath, opts);
  let pending = '';

  for await (const chunk of createReadStream(filePath)) {
    pending += decoder.decode(chunk, { stream: true });
    const pieces = pending.split('\n');
    pending = pieces.pop() ?? '';

    for (const piece of pieces) {
      const closed = await writer.add(`${piece}\n`);
      if (closed) yield closed;
    }
  }

  pending += decoder.decode();
  if (pending) {
    const closed = await writer.add(pending);
    if (closed) yield closed;
  }

  const last = await writer.finish();
  if (last) {
    yield last;
  } else {
    logger.warn({ file: filePath, hasHeader: writer.hasHeader }, 'No data rows found, nothing to upload');
  }
}
