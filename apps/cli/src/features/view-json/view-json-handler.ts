import { prettyPrintJson, readTextFile } from '@stocklog/data';
import { err, type Result } from 'neverthrow';

/**
 * Read a JSON file and return it re-indented with two spaces.
 */
export async function viewJsonFile(path: string): Promise<Result<string, Error>> {
  const content = await readTextFile(path);
  if (content.isErr()) return err(content.error);
  return prettyPrintJson(content.value);
}
