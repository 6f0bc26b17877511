export { CSV_HEADER, itemsToCsv, parseItemsCsv } from './csv.js';
export { itemsToJson, parseItemsJson, prettyPrintJson } from './json.js';
export { importItems } from './import.js';
export { readTextFile, writeTextFile } from './files.js';
