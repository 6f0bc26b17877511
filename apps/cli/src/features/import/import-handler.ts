import { extname } from 'node:path';

import type { InventoryStore } from '@stocklog/data';
import { err, ok, type Result } from 'neverthrow';

import type { InterchangeFormat } from '../shared/schemas.js';

export interface ImportHandlerParams {
  inputPath: string;
  /** Taken from the file extension when omitted */
  format?: InterchangeFormat | undefined;
}

export interface ImportResult {
  format: InterchangeFormat;
  inputPath: string;
  imported: number;
}

/**
 * Format named by a .csv or .json extension.
 */
export function formatFromPath(path: string): InterchangeFormat | undefined {
  const extension = extname(path).toLowerCase();
  if (extension === '.csv') return 'csv';
  if (extension === '.json') return 'json';
  return undefined;
}

export class ImportHandler {
  constructor(private readonly store: InventoryStore) {}

  /**
   * Import the whole file in one transaction.
   */
  async execute(params: ImportHandlerParams): Promise<Result<ImportResult, Error>> {
    const format = params.format ?? formatFromPath(params.inputPath);
    if (!format) {
      return err(new Error(`Cannot tell the format of ${params.inputPath}; pass --format csv or --format json`));
    }

    const imported =
      format === 'csv'
        ? await this.store.importCsvFile(params.inputPath)
        : await this.store.importJsonFile(params.inputPath);
    if (imported.isErr()) return err(imported.error);

    return ok({ format, inputPath: params.inputPath, imported: imported.value });
  }
}
