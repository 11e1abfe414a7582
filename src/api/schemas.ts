/**
 * API Request Schemas
 */

import { z } from "zod";

const FieldsSchema = z.record(z.string(), z.string());

/** POST /v1/sessions/:sessionId/items request body. */
export const CreateItemSchema = z.object({
  // Checked against the template registry, so unknown types surface as MISSING_TEMPLATE.
  type: z.string().min(1),
  title: z.string(),
  fields: FieldsSchema.optional(),
});

export type CreateItemRequest = z.infer<typeof CreateItemSchema>;

/** POST /v1/sessions/:sessionId/items/batch request body. */
export const CreateBatchSchema = z.object({
  items: z.array(CreateItemSchema).min(1),
});

/** POST /v1/sessions/:sessionId/map request body. */
export const ChapterMapRequestSchema = z.object({
  chapterName: z.string(),
});

/** POST /v1/sessions/:sessionId/export request body. */
export const ExportRequestSchema = z.object({
  chapterName: z.string().optional(),
});
