/**
 * Whole-file text I/O for argument files and return values.
 *
 * The path `-` means standard input when reading and standard output when
 * writing. Gzip input is detected by its magic bytes; output to a path
 * ending in `.gz` is compressed.
 */
import * as fs from 'node:fs';
import { gunzipSync, gzipSync } from 'node:zlib';
import { SystemError, ErrorCodes, describeError } from '../../utils/errors.js';

export const STANDARD_STREAM = '-';

export type Newline = '\n' | '\r\n' | '\r';

export interface TextStreams {
  /** Read the whole text at a path, with line endings normalised to `\n`. */
  read(path: string): string;
  /** Write text to a path, replacing `\n` with the configured newline. */
  write(path: string, text: string): void;
}

export interface NodeTextStreamsOptions {
  newline?: Newline;
  stdin?: () => Buffer;
  stdout?: (text: string) => void;
}

const GZIP_MAGIC = [0x1f, 0x8b];

export function isGzip(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === GZIP_MAGIC[0] && data[1] === GZIP_MAGIC[1];
}

export function normaliseNewlines(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

export class NodeTextStreams implements TextStreams {
  private readonly newline: Newline;
  private readonly stdin: () => Buffer;
  private readonly stdout: (text: string) => void;

  constructor(options: NodeTextStreamsOptions = {}) {
    this.newline = options.newline ?? '\n';
    this.stdin = options.stdin ?? (() => fs.readFileSync(0));
    this.stdout = options.stdout ?? ((text) => {
      process.stdout.write(text);
    });
  }

  read(path: string): string {
    let raw: Buffer;
    try {
      raw = path === STANDARD_STREAM ? this.stdin() : fs.readFileSync(path);
    } catch (error) {
      throw new SystemError(ErrorCodes.FILE_ERROR, `cannot read ${displayPath(path)}: ${describeError(error)}`, {
        path,
      });
    }
    const data = isGzip(raw) ? gunzipSync(raw) : raw;
    return normaliseNewlines(data.toString('utf-8'));
  }

  write(path: string, text: string): void {
    const output = this.newline === '\n' ? text : text.replace(/\n/g, this.newline);
    if (path === STANDARD_STREAM) {
      this.stdout(output);
      return;
    }
    try {
      fs.writeFileSync(path, path.endsWith('.gz') ? gzipSync(output) : output, 'utf-8');
    } catch (error) {
      throw new SystemError(ErrorCodes.FILE_ERROR, `cannot write ${displayPath(path)}: ${describeError(error)}`, {
        path,
      });
    }
  }
}

function displayPath(path: string): string {
  return path === STANDARD_STREAM ? 'standard stream' : path;
}
