import fs from 'fs';
import type { Logger } from 'pino';
import defaultLogger from '../../utils/logger';
import { getOrElse, isJsonObject, none, Option, readString, some } from '../../utils/option';
import { EMPTY_TELEMETRY, TelemetryStats } from './types';

const CHUNK_SIZE = 64 * 1024;
const NEWLINE = 0x0a;

export interface TelemetryScan {
  /** Newline count of the whole file */
  totalLines: number;
  /** Up to `window` trailing lines, oldest first */
  tail: string[];
}

function countNewlines(buffer: Buffer, length: number): number {
  let count = 0;
  for (let i = 0; i < length; i++) {
    if (buffer[i] === NEWLINE) count++;
  }
  return count;
}

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

export function localPercentage(localQueries: number, remoteQueries: number): number {
  const total = localQueries + remoteQueries;
  if (total === 0) return 0;
  return Math.floor((localQueries * 100) / total);
}

/**
 * Reads append-only NDJSON telemetry logs without loading them whole:
 * one forward pass counts newlines, one backward pass collects the tail.
 */
export class TelemetryReader {
  private log: Logger;

  constructor(
    private windowSize = 100,
    private tokensPerLocalQuery = 500,
    logger: Logger = defaultLogger
  ) {
    this.log = logger.child({ component: 'telemetry' });
  }

  /**
   * Scan a log file. A missing file is not an error and yields none().
   */
  scan(filePath: string): Option<TelemetryScan> {
    let fd: number;
    try {
      fd = fs.openSync(filePath, 'r');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return none();
      }
      this.log.warn({ err: error, filePath }, 'cannot open telemetry log');
      return none();
    }

    try {
      const size = fs.fstatSync(fd).size;
      return some({
        totalLines: this.countLines(fd, size),
        tail: this.readTail(fd, size),
      });
    } catch (error) {
      this.log.warn({ err: error, filePath }, 'cannot read telemetry log');
      return none();
    } finally {
      fs.closeSync(fd);
    }
  }

  /**
   * Telemetry stats for a service; zeros when the log is absent.
   */
  read(filePath: string | null): TelemetryStats {
    if (filePath === null) return { ...EMPTY_TELEMETRY };
    const scan = this.scan(filePath);
    return scan.some ? this.summarize(scan.value) : { ...EMPTY_TELEMETRY };
  }

  summarize(scan: TelemetryScan): TelemetryStats {
    let localQueries = 0;
    let remoteQueries = 0;
    let lastEvent: unknown;

    for (const line of scan.tail) {
      if (line.trim() === '') continue;
      const event = parseLine(line);
      lastEvent = event;
      if (!isJsonObject(event)) continue;
      if (event.decision === 'local') localQueries++;
      else if (event.decision === 'remote') remoteQueries++;
    }

    return {
      totalEvents: scan.totalLines,
      lastEventTime: getOrElse<string | null>(readString(lastEvent, 'timestamp'), null),
      localQueries,
      remoteQueries,
      localPercentage: localPercentage(localQueries, remoteQueries),
      estimatedTokensSaved: localQueries * this.tokensPerLocalQuery,
    };
  }

  private countLines(fd: number, size: number): number {
    const buffer = Buffer.alloc(Math.min(CHUNK_SIZE, Math.max(size, 1)));
    let position = 0;
    let lines = 0;
    while (position < size) {
      const bytesRead = fs.readSync(fd, buffer, 0, buffer.length, position);
      if (bytesRead === 0) break;
      lines += countNewlines(buffer, bytesRead);
      position += bytesRead;
    }
    return lines;
  }

  private readTail(fd: number, size: number): string[] {
    const chunks: Buffer[] = [];
    let position = size;
    let newlines = 0;

    // one newline more than the window guarantees the first kept line is whole
    while (position > 0 && newlines <= this.windowSize) {
      const length = Math.min(CHUNK_SIZE, position);
      position -= length;
      const chunk = Buffer.alloc(length);
      const bytesRead = fs.readSync(fd, chunk, 0, length, position);
      chunks.unshift(chunk.subarray(0, bytesRead));
      newlines += countNewlines(chunk, bytesRead);
    }

    const lines = Buffer.concat(chunks).toString('utf8').split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    if (position > 0) lines.shift();
    return lines.slice(-this.windowSize);
  }
}
