/**
 * compliance-csv — Report destinations.
 *
 * A destination is an already-opened text sink. The writer only writes
 * to it and closes it; opening and naming the file belongs to the caller.
 */

import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';

export interface ReportDestination {
  readonly closed: boolean;
  write(text: string): void;
  close(): void;
}

export type FileMode = 'w' | 'a';

/** Synchronous file sink backed by a node:fs descriptor. */
export class FileDestination implements ReportDestination {
  readonly path: string;
  private fd: number | null;

  constructor(path: string, mode: FileMode = 'w') {
    mkdirSync(dirname(path), { recursive: true });
    this.path = path;
    this.fd = openSync(path, mode);
  }

  get closed(): boolean {
    return this.fd === null;
  }

  write(text: string): void {
    if (this.fd === null) throw new Error(`Destination ${this.path} is closed`);
    writeSync(this.fd, text);
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }
}
