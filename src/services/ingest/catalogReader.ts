import fs from "node:fs";
import readline from "node:readline";
import { pipeline, Transform, type Readable } from "node:stream";
import { createGunzip } from "node:zlib";
import type { Logger } from "pino";
import StreamJson from "stream-json";
import Pick from "stream-json/filters/Pick";
import StreamArray from "stream-json/streamers/StreamArray";
import { ValidationError, describeError } from "../../errors";

export type CatalogFormat = "json_array" | "ndjson" | "wrapper";

export interface CatalogSniff {
  gzip: boolean;
  format: CatalogFormat;
}

export interface CatalogReadStats {
  records: number;
  undecodableLines: number;
}

const GZIP_MAGIC = [0x1f, 0x8b];
const HEAD_BYTES = 64 * 1024;
const WRAPPER_KEYS = /^(data|cards)$/;

const stripBom = (text: string): string => (text.charCodeAt(0) === 0xfeff ? text.slice(1) : text);

const stripLeadingBom = (): Transform => {
  let first = true;
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      if (first) {
        first = false;
        if (chunk.length >= 3 && chunk[0] === 0xef && chunk[1] === 0xbb && chunk[2] === 0xbf) {
          callback(null, chunk.subarray(3));
          return;
        }
      }
      callback(null, chunk);
    },
  });
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const detectGzip = async (filePath: string): Promise<boolean> => {
  const handle = await fs.promises.open(filePath, "r");
  try {
    const magic = Buffer.alloc(2);
    const { bytesRead } = await handle.read(magic, 0, 2, 0);
    return bytesRead === 2 && magic[0] === GZIP_MAGIC[0] && magic[1] === GZIP_MAGIC[1];
  } finally {
    await handle.close();
  }
};

/**
 * Classifies decoded catalog text by its first significant character.
 * `{` is line-delimited when the first line is a complete card object,
 * otherwise an object wrapping a `data` or `cards` array.
 */
export const classifyCatalogHead = (head: string): CatalogFormat | null => {
  const text = stripBom(head).trimStart();
  if (text.startsWith("[")) return "json_array";
  if (!text.startsWith("{")) return null;

  const newline = text.indexOf("\n");
  const firstLine = (newline === -1 ? text : text.slice(0, newline)).trim().replace(/,$/, "");
  try {
    const parsed: unknown = JSON.parse(firstLine);
    if (isRecord(parsed)) {
      const wraps = Object.keys(parsed).some((key) => WRAPPER_KEYS.test(key) && Array.isArray(parsed[key]));
      return wraps && !("id" in parsed) ? "wrapper" : "ndjson";
    }
    return "wrapper";
  } catch {
    return "wrapper";
  }
};

export class CatalogReader {
  readonly stats: CatalogReadStats = { records: 0, undecodableLines: 0 };

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
  ) {}

  async sniff(): Promise<CatalogSniff> {
    try {
      const stat = await fs.promises.stat(this.filePath);
      if (!stat.isFile()) {
        throw new ValidationError(`Catalog path is not a file: ${this.filePath}`);
      }
    } catch (error) {
      if (error instanceof ValidationError) throw error;
      throw new ValidationError(`Catalog file is not readable: ${this.filePath}`, [describeError(error)], {
        cause: error,
      });
    }

    const gzip = await detectGzip(this.filePath);
    const head = await this.readHead(gzip);
    if (head.trim().length === 0) {
      throw new ValidationError(`Catalog file is empty: ${this.filePath}`);
    }
    const format = classifyCatalogHead(head);
    if (!format) {
      throw new ValidationError(`Unrecognized catalog format in ${this.filePath}`, [
        "expected a JSON array, a JSON object, or one JSON object per line",
      ]);
    }
    return { gzip, format };
  }

  /** Streams raw catalog records one at a time; never holds the whole file. */
  async *records(): AsyncGenerator<unknown> {
    const { gzip, format } = await this.sniff();
    this.logger.info({ file: this.filePath, gzip, format }, "Reading catalog");

    if (format === "ndjson") {
      yield* this.readLines(gzip);
      return;
    }

    const onError = (error: NodeJS.ErrnoException | null) => {
      if (error) this.logger.debug({ err: error }, "Catalog stream closed with error");
    };
    const decoded = this.openDecoded(gzip);
    const elements =
      format === "wrapper"
        ? pipeline(decoded, StreamJson.parser(), Pick.pick({ filter: WRAPPER_KEYS }), StreamArray.streamArray(), onError)
        : pipeline(decoded, StreamJson.parser(), StreamArray.streamArray(), onError);

    for await (const item of elements) {
      const entry: unknown = item;
      if (isRecord(entry) && "value" in entry) {
        this.stats.records++;
        yield entry.value;
      }
    }
  }

  private openDecoded(gzip: boolean): Readable {
    const source = fs.createReadStream(this.filePath);
    const onError = (error: NodeJS.ErrnoException | null) => {
      if (error) this.logger.debug({ err: error }, "Catalog source closed with error");
    };
    return gzip
      ? pipeline(source, createGunzip(), stripLeadingBom(), onError)
      : pipeline(source, stripLeadingBom(), onError);
  }

  private async readHead(gzip: boolean): Promise<string> {
    const stream = this.openDecoded(gzip);
    const chunks: Buffer[] = [];
    let size = 0;
    for await (const chunk of stream) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      chunks.push(buffer);
      size += buffer.length;
      if (size >= HEAD_BYTES || buffer.includes(0x0a)) break;
    }
    stream.destroy();
    return Buffer.concat(chunks).toString("utf8");
  }

  private async *readLines(gzip: boolean): AsyncGenerator<unknown> {
    const lines = readline.createInterface({ input: this.openDecoded(gzip), crlfDelay: Infinity });
    let lineNumber = 0;
    for await (const rawLine of lines) {
      lineNumber++;
      let line = rawLine.trim();
      if (line === "" || line === "[" || line === "]") continue;
      if (line.endsWith(",")) line = line.slice(0, -1);
      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch (error) {
        this.stats.undecodableLines++;
        this.logger.debug({ line: lineNumber, error: describeError(error) }, "Skipping undecodable catalog line");
        continue;
      }
      this.stats.records++;
      yield value;
    }
  }
}

/** Opens a catalog dump for streaming; fails early when the file cannot be read as one. */
export const openCatalogStream = async (filePath: string, logger: Logger): Promise<CatalogReader> => {
  const reader = new CatalogReader(filePath, logger);
  await reader.sniff();
  return reader;
};
