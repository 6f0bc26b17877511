// Item model
export { ITEM_FIELDS, ItemListSchema, ItemSchema, hasAssignedId, type Item, type ItemField, type NewItem } from './item/item.js';
export {
  REMARKS_PREFIX_PATTERN,
  formatRemarks,
  formatRemarksEntry,
  parseRemarksEntries,
  type RemarksEntry,
  type RemarksFormatOptions,
} from './item/remarks.js';
export { itemFromJson, itemToJson } from './item/item-json.js';

// Time
export { fixedClock, formatTimestamp, isValidTimeZone, systemClock, type Clock } from './clock.js';

// Errors
export {
  BootstrapError,
  InterchangeError,
  InventoryError,
  NotFoundError,
  QueryError,
  TransactionError,
  WriteError,
  isInventoryError,
  isNotFoundError,
  type ErrorContext,
  type InventoryErrorCode,
} from './errors/index.js';

// Utils
export { getErrorMessage, isErrorWithMessage, wrapError } from './utils/type-guard-utils.js';
export { formatZodIssues, fromZod } from './utils/zod-utils.js';
