// JSON snapshot of the indexed corpus with a sha256 checksum. Any mismatch on load is corruption.
import { createHash } from 'crypto';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { TravelDocument } from '@/types/core';
import { PRICE_TIERS } from '@/types/core';
import { IndexCorruptionError, errorMessage } from './errors';
import { logger } from './logger';

export const SNAPSHOT_VERSION = 1;

const snapshotDocumentSchema = z.object({
  docId: z.string().min(1),
  title: z.string(),
  bodyText: z.string(),
  fields: z.object({
    city: z.string().nullable(),
    country: z.string().nullable(),
    activities: z.array(z.string()),
    priceTier: z.enum(PRICE_TIERS).nullable(),
    completeness: z.enum(['full', 'partial']),
  }),
  embedding: z.array(z.number()),
});

const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  dimension: z.number().int().positive(),
  createdAt: z.string(),
  checksum: z.string().regex(/^[a-f0-9]{64}$/),
  documents: z.array(snapshotDocumentSchema),
});

type SnapshotDocument = z.infer<typeof snapshotDocumentSchema>;

function toSnapshotDocument(doc: TravelDocument): SnapshotDocument {
  return {
    docId: doc.docId,
    title: doc.title,
    bodyText: doc.bodyText,
    fields: {
      city: doc.fields.city,
      country: doc.fields.country,
      activities: [...doc.fields.activities].sort(),
      priceTier: doc.fields.priceTier,
      completeness: doc.fields.completeness,
    },
    embedding: doc.embedding,
  };
}

export function snapshotChecksum(dimension: number, documents: SnapshotDocument[]): string {
  return createHash('sha256')
    .update(JSON.stringify({ version: SNAPSHOT_VERSION, dimension, documents }))
    .digest('hex');
}

/** Writes to a temp file and renames it over the target. */
export async function saveSnapshot(
  filePath: string,
  documents: readonly TravelDocument[],
  dimension: number,
): Promise<void> {
  const docs = [...documents]
    .sort((a, b) => (a.docId < b.docId ? -1 : a.docId > b.docId ? 1 : 0))
    .map(toSnapshotDocument);
  const body = {
    version: SNAPSHOT_VERSION,
    dimension,
    createdAt: new Date().toISOString(),
    checksum: snapshotChecksum(dimension, docs),
    documents: docs,
  };
  await mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp`;
  await writeFile(tmp, JSON.stringify(body), 'utf8');
  await rename(tmp, filePath);
  logger.info('snapshot:saved', { path: filePath, documents: docs.length });
}

/**
 * Reads and verifies a snapshot. Resolves null when the file does not exist;
 * throws IndexCorruptionError for anything unreadable or inconsistent.
 */
export async function loadSnapshot(
  filePath: string,
  expectedDimension: number,
): Promise<TravelDocument[] | null> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new IndexCorruptionError(`Snapshot ${filePath} is not valid JSON: ${errorMessage(err)}`);
  }

  const parsed = snapshotSchema.safeParse(json);
  if (!parsed.success) {
    const problems = parsed.error.errors
      .slice(0, 5)
      .map((e) => `${e.path.join('.') || 'root'}: ${e.message}`);
    throw new IndexCorruptionError(`Snapshot ${filePath} failed schema check: ${problems.join('; ')}`);
  }

  const snapshot = parsed.data;
  if (snapshot.dimension !== expectedDimension) {
    throw new IndexCorruptionError(
      `Snapshot dimension ${snapshot.dimension} does not match embedding dimension ${expectedDimension}`,
    );
  }
  if (snapshotChecksum(snapshot.dimension, snapshot.documents) !== snapshot.checksum) {
    throw new IndexCorruptionError(`Snapshot ${filePath} checksum mismatch`);
  }

  const seen = new Set<string>();
  for (const doc of snapshot.documents) {
    if (seen.has(doc.docId)) {
      throw new IndexCorruptionError(`Snapshot contains duplicate docId ${doc.docId}`);
    }
    seen.add(doc.docId);
    if (doc.embedding.length !== snapshot.dimension) {
      throw new IndexCorruptionError(
        `Snapshot embedding for ${doc.docId} has ${doc.embedding.length} dimensions, expected ${snapshot.dimension}`,
      );
    }
  }

  return snapshot.documents.map((doc) => ({
    ...doc,
    fields: { ...doc.fields, activities: new Set(doc.fields.activities) },
  }));
}
