import { z } from 'zod';

/**
 * Request and ingestion schemas. Route handlers and the indexing pipeline
 * validate with these so the rest of the code only sees typed data.
 */

export const MAX_SEARCH_LIMIT = 100;

export const rawDocumentSchema = z
  .object({
    docId: z
      .string()
      .trim()
      .min(1, 'docId cannot be empty')
      .max(200, 'docId is too long'),
    title: z.string().trim().max(1_000),
    bodyText: z.string().max(200_000),
  })
  .refine((d) => d.title.length > 0 || d.bodyText.trim().length > 0, {
    message: 'title or bodyText must be non-empty',
    path: ['bodyText'],
  });

export type RawDocumentInput = z.infer<typeof rawDocumentSchema>;

export const searchRequestSchema = z.object({
  query: z.string().trim().min(1, 'Query is required and cannot be empty').max(1_000),
  mode: z.enum(['lexical', 'vector', 'hybrid']).optional().default('hybrid'),
  limit: z.coerce.number().int().min(1).max(MAX_SEARCH_LIMIT).optional().default(10),
});

export type SearchRequestBody = z.infer<typeof searchRequestSchema>;

export const rewriteRequestSchema = z.object({
  query: z.string().trim().min(1, 'Query is required and cannot be empty').max(1_000),
});

export type RewriteRequestBody = z.infer<typeof rewriteRequestSchema>;

export const documentBodySchema = z.object({
  title: z.string(),
  bodyText: z.string(),
});

export const batchRequestSchema = z.object({
  // Items are validated one by one by the pipeline; a bad item is skipped, not the batch.
  documents: z.array(z.unknown()).min(1, 'documents cannot be empty').max(1_000),
});

export type ValidationIssue = { path: string; message: string };

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: ValidationIssue[] };

export function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.errors.map((e) => ({
    path: e.path.join('.') || 'root',
    message: e.message,
  }));
}

/**
 * Validates `data` against `schema`
 * @returns typed data or the list of issues
 */
export function validate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
): ValidationResult<z.output<S>> {
  const result = schema.safeParse(data);
  if (!result.success) {
    return { success: false, error: toIssues(result.error) };
  }
  return { success: true, data: result.data };
}
