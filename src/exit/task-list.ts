import { readFile } from 'node:fs/promises';
import type { TaskProgress } from '../types/index.js';

const CHECKLIST_ITEM = /^\s*[-*] \[.\]/;
const COMPLETED_ITEM = /^\s*[-*] \[[xX]\]/;

export function parseTaskProgress(content: string): TaskProgress {
  let total = 0;
  let completed = 0;
  for (const line of content.split(/\r?\n/)) {
    if (!CHECKLIST_ITEM.test(line)) continue;
    total++;
    if (COMPLETED_ITEM.test(line)) completed++;
  }
  return { total, completed };
}

/**
 * Completion counts for a markdown checklist. A missing file means there is no
 * task list to consult, which is not an error.
 */
export async function readTaskProgress(filePath: string): Promise<TaskProgress | null> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
  return parseTaskProgress(content);
}
