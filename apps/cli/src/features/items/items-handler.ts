import type { Item, QueryError } from '@stocklog/core';
import type { InventoryStore, ItemFilter } from '@stocklog/data';
import { getLogger } from '@stocklog/logger';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('ItemsHandler');

export interface AddItemParams {
  description: string;
  location: string;
  status: string;
  remarks: string;
}

export interface EditItemParams {
  id: number;
  description?: string | undefined;
  location?: string | undefined;
  status?: string | undefined;
  remarks?: string | undefined;
}

export interface ListItemsParams {
  after?: number | undefined;
  limit?: number | undefined;
}

export interface RemoveItemResult {
  id: number;
  removed: boolean;
}

export interface SequenceResult {
  sequence: number | undefined;
}

/**
 * Item commands on top of one open store.
 */
export class ItemsHandler {
  constructor(private readonly store: InventoryStore) {}

  async add(params: AddItemParams): Promise<Result<Item, Error>> {
    const idResult = await this.store.addItem(params);
    if (idResult.isErr()) return err(idResult.error);

    logger.info({ id: idResult.value }, 'Added item');
    return this.store.getItemById(idResult.value);
  }

  /**
   * Fields left undefined keep their stored value. Unlike the store's editItem,
   * an unknown id is reported as not found.
   */
  async edit(params: EditItemParams): Promise<Result<Item, Error>> {
    const current = await this.store.getItemById(params.id);
    if (current.isErr()) return err(current.error);

    const edited = await this.store.editItem({
      id: params.id,
      description: params.description ?? current.value.description,
      location: params.location ?? current.value.location,
      status: params.status ?? current.value.status,
      remarks: params.remarks ?? '',
    });
    if (edited.isErr()) return err(edited.error);

    return this.store.getItemById(params.id);
  }

  async log(id: number, message: string): Promise<Result<Item, Error>> {
    const appended = await this.store.appendRemarksEntry(id, message);
    if (appended.isErr()) return err(appended.error);
    return this.store.getItemById(id);
  }

  async remove(id: number): Promise<Result<RemoveItemResult, Error>> {
    const deleted = await this.store.deleteItem(id);
    if (deleted.isErr()) return err(deleted.error);
    return ok({ id, removed: deleted.value > 0 });
  }

  show(id: number): Promise<Result<Item, Error>> {
    return this.store.getItemById(id);
  }

  async list(params: ListItemsParams): Promise<Result<Item[], Error>> {
    const after = params.after ?? 0;
    if (params.limit !== undefined) {
      return this.store.listPaged(after, params.limit);
    }

    const all = await this.store.listAll();
    return all.map((items) => items.filter((item) => item.id > after));
  }

  async find(filter: ItemFilter): Promise<Result<Item[], QueryError>> {
    const iteratorResult = await this.store.createIterator(filter);
    if (iteratorResult.isErr()) return err(iteratorResult.error);

    const items: Item[] = [];
    for await (const item of iteratorResult.value) {
      if (item.isErr()) return err(item.error);
      items.push(item.value);
    }
    return ok(items);
  }

  async resetSequence(): Promise<Result<SequenceResult, Error>> {
    const reset = await this.store.resetSequence();
    if (reset.isErr()) return err(reset.error);

    const sequence = await this.store.getSequence();
    return sequence.map((value) => ({ sequence: value }));
  }
}
