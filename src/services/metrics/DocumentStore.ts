import fs from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import type { IStateStore } from '../../stores/interfaces';
import defaultLogger from '../../utils/logger';
import { decodeDocument, encodeDocument } from './codec';
import type { MetricsDocument } from './types';

export const LAST_DOCUMENT_KEY = 'last-document';

/**
 * Write a file by renaming a sibling temp file over it, so readers never see
 * a partial document.
 */
export function writeFileAtomic(filePath: string, contents: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    fs.writeFileSync(tempPath, contents, { encoding: 'utf8', mode: 0o644 });
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

/**
 * Keeps the last cycle's document: serialized in the state store for
 * coalesced replays, and optionally mirrored to a JSON file for the dashboard.
 */
export class DocumentStore {
  private log: Logger;

  constructor(
    private store: IStateStore,
    private outputFile: string | null,
    logger: Logger = defaultLogger
  ) {
    this.log = logger.child({ component: 'document-store' });
  }

  load(): MetricsDocument | undefined {
    return decodeDocument(this.store.findByKey(LAST_DOCUMENT_KEY)?.value);
  }

  /**
   * Persist a document. Returns its serialization. A failed file write is
   * logged and does not undo the store write.
   */
  save(document: MetricsDocument): string {
    const serialized = encodeDocument(document);
    this.store.put(LAST_DOCUMENT_KEY, serialized);

    if (this.outputFile !== null) {
      try {
        writeFileAtomic(this.outputFile, `${JSON.stringify(document, null, 2)}\n`);
      } catch (error) {
        this.log.error({ err: error, outputFile: this.outputFile }, 'failed to write metrics file');
      }
    }

    return serialized;
  }
}
