/**
 * Run Writer
 * Saves run results to disk as pretty-printed JSON
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { contentHash } from '@/core/seed';
import type { ScreenRunResult } from '@/types/opportunity';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('run_writer');

export interface WriteResult {
  filePath: string;
  contentHash: string;
}

/** `generatedAt` is the only wall-clock value and stays outside the result hash. */
export function writeRunResult(
  result: ScreenRunResult,
  outputPath: string,
  generatedAt: Date
): WriteResult {
  const filePath = resolve(process.cwd(), outputPath);
  mkdirSync(dirname(filePath), { recursive: true });

  const record = { generatedAt: generatedAt.toISOString(), ...result };
  writeFileSync(filePath, JSON.stringify(record, null, 2), 'utf-8');

  const hash = contentHash(record);
  logger.info({ filePath, resultHash: result.resultHash }, 'Run result written');

  return { filePath, contentHash: hash };
}
