import type { InventoryStore } from '@stocklog/data';
import { getLogger } from '@stocklog/logger';
import { err, ok, type Result } from 'neverthrow';

import type { InterchangeFormat } from '../shared/schemas.js';

const logger = getLogger('ExportHandler');

export interface ExportHandlerParams {
  format: InterchangeFormat;
  /** Write here instead of returning the content */
  outputPath?: string | undefined;
}

export interface ExportResult {
  format: InterchangeFormat;
  itemCount: number;
  outputPath?: string | undefined;
  /** Exported document when no outputPath was given */
  content?: string | undefined;
}

export class ExportHandler {
  constructor(private readonly store: InventoryStore) {}

  async execute(params: ExportHandlerParams): Promise<Result<ExportResult, Error>> {
    const count = await this.store.countItems();
    if (count.isErr()) return err(count.error);

    if (params.outputPath) {
      const written =
        params.format === 'csv'
          ? await this.store.exportCsvFile(params.outputPath)
          : await this.store.exportJsonFile(params.outputPath);
      if (written.isErr()) return err(written.error);

      logger.info({ format: params.format, path: params.outputPath, count: count.value }, 'Exported items');
      return ok({ format: params.format, itemCount: count.value, outputPath: params.outputPath });
    }

    const content = params.format === 'csv' ? await this.store.exportCsv() : await this.store.exportJson();
    if (content.isErr()) return err(content.error);

    return ok({ format: params.format, itemCount: count.value, content: content.value });
  }
}
