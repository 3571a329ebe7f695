import * as fs from 'fs';
import * as path from 'path';

import type { CapturedMessage } from '@/capture/types.js';
import { UTF8_ENCODING } from '@/constants.js';
import { OutputFileError, getErrorMessage } from '@/utils/errors.js';

/**
 * Append-only JSON Lines log of captured messages.
 *
 * One record per line, written with a single append each so that an
 * interrupted process leaves at most one partial trailing line. The file is
 * created on first append and never truncated.
 */
export class CaptureLog {
  private directoryReady = false;
  private appended = 0;

  constructor(readonly filePath: string) {}

  /**
   * Serialize one record as a JSON Lines entry.
   */
  static formatRecord(message: CapturedMessage): string {
    const record: CapturedMessage = {
      timestamp: message.timestamp,
      message_id: message.message_id,
      type: message.type,
      content: message.content,
      html_snippet: message.html_snippet,
      element_location: message.element_location,
    };
    return `${JSON.stringify(record)}\n`;
  }

  /**
   * Append records, in order.
   *
   * @throws OutputFileError if the directory cannot be created or the write fails
   */
  async append(...messages: CapturedMessage[]): Promise<void> {
    if (messages.length === 0) return;

    try {
      if (!this.directoryReady) {
        await fs.promises.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
        this.directoryReady = true;
      }
      await fs.promises.appendFile(
        this.filePath,
        messages.map((message) => CaptureLog.formatRecord(message)).join(''),
        { encoding: UTF8_ENCODING }
      );
      this.appended += messages.length;
    } catch (error) {
      throw new OutputFileError(`Cannot write ${this.filePath}: ${getErrorMessage(error)}`, {
        cause: error,
        suggestions: ['Choose a writable location with --output'],
      });
    }
  }

  /**
   * Records appended through this instance.
   */
  get count(): number {
    return this.appended;
  }
}
