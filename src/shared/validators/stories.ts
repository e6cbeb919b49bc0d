import { z } from 'zod';

const optText = z.string().nullable().optional();

export const storyRecordSchema = z
  .object({
    id: z.union([z.string(), z.number()]),
    title: z.string(),
    imagePrompt: optText,
    difficultyLevel: z.number().int(),
    coverImageURL: optText,
    updatedAt: optText,
  })
  .passthrough();

export const storyDatasetSchema = z
  .object({
    stories: z.array(storyRecordSchema),
  })
  .passthrough();

// Validates without rebuilding, so callers keep the original key order.
export function isStoryDataset(value: unknown): value is z.infer<typeof storyDatasetSchema> {
  return storyDatasetSchema.safeParse(value).success;
}

export function describeDatasetIssues(error: z.ZodError) {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
