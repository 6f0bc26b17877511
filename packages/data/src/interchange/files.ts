import { readFile, writeFile } from 'node:fs/promises';

import { InterchangeError, getErrorMessage } from '@stocklog/core';
import { err, ok, type Result } from 'neverthrow';

export async function readTextFile(path: string): Promise<Result<string, InterchangeError>> {
  try {
    const content = await readFile(path, 'utf8');
    return ok(content);
  } catch (error) {
    return err(new InterchangeError(`read ${path} failed: ${getErrorMessage(error)}`, { operation: 'read file' }, error));
  }
}

export async function writeTextFile(path: string, content: string): Promise<Result<void, InterchangeError>> {
  try {
    await writeFile(path, content, 'utf8');
    return ok(undefined);
  } catch (error) {
    return err(
      new InterchangeError(`write ${path} failed: ${getErrorMessage(error)}`, { operation: 'write file' }, error)
    );
  }
}
