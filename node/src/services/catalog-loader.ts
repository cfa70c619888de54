// Reads a JSON array of raw documents for bulk ingestion. Items are validated later, one by one, by the pipeline.
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors';

const catalogSchema = z.array(z.unknown());

export async function loadCatalog(filePath: string): Promise<unknown[]> {
  const text = await readFile(filePath, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new ConfigError([`catalog ${filePath}: not valid JSON`]);
  }
  const parsed = catalogSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError([`catalog ${filePath}: expected a JSON array of documents`]);
  }
  return parsed.data;
}
