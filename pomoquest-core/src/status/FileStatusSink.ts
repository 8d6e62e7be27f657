/**
 * Status sink backed by a plain-text file that status bars poll.
 * Last write wins; writes never throw into the session loop.
 */

import * as fs from 'fs';
import { getStatusPath } from '../paths';
import { errorMessage } from '../errors';

export interface StatusSink {
  publish(text: string): void;
  /** Resolves once every queued write has settled. */
  flush(): Promise<void>;
  clear(): void;
}

export class FileStatusSink implements StatusSink {
  private last: string | null = null;
  private reported = false;
  private pending: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string = getStatusPath(),
    private readonly onError?: (message: string) => void,
  ) {}

  /** Fire-and-forget overwrite. Identical consecutive lines are skipped. */
  publish(text: string): void {
    if (text === this.last) return;
    this.last = text;
    this.pending = this.pending
      .then(() => fs.promises.writeFile(this.filePath, text, 'utf-8'))
      .catch((err: unknown) => this.report(err));
  }

  flush(): Promise<void> {
    return this.pending;
  }

  /** Synchronous so it lands before the process exits; call after flush(). */
  clear(): void {
    this.last = '';
    try {
      fs.writeFileSync(this.filePath, '', 'utf-8');
    } catch (err) {
      this.report(err);
    }
  }

  private report(err: unknown): void {
    if (this.reported) return;
    this.reported = true;
    this.onError?.(`Cannot write status file ${this.filePath}: ${errorMessage(err)}`);
  }
}
