import { z } from 'zod';

export const InterchangeEntrySchema = z.object({
  name: z.string().min(1).describe('Repository-relative file path'),
  content: z.string().nullable().describe('Full file content; null means the file must be removed'),
});

export type InterchangeEntry = z.infer<typeof InterchangeEntrySchema>;

// Editors answer either with the bare array or wrapped as { files: [...] }.
export const PayloadSchema = z.union([
  z.array(InterchangeEntrySchema),
  z.object({ files: z.array(InterchangeEntrySchema) }).transform(p => p.files),
]);
