import { existsSync } from 'node:fs';
import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

export const STOP_FILE = 'stop';

/**
 * Sentinel-file stop request. Anyone may create the file; the controller samples
 * it at the top of each iteration and removes it once observed.
 */
export class StopSignal {
  readonly path: string;

  constructor(stateDir: string) {
    this.path = join(stateDir, STOP_FILE);
  }

  isRequested(): boolean {
    return existsSync(this.path);
  }

  async clear(): Promise<void> {
    await rm(this.path, { force: true });
  }

  async request(): Promise<void> {
    await writeFile(this.path, '');
  }
}
