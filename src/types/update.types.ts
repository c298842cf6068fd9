import { z } from 'zod';

export const UPDATE_FILE_VERSION = 1;

/**
 * Newest issue downloaded for a tracked series
 */
export const LatestIssueSchema = z.object({
  issueId: z.string().min(1),
  order: z.number(),
});

export type LatestIssue = z.infer<typeof LatestIssueSchema>;

/**
 * Tracked series. Fields written by newer versions are kept as-is.
 */
export const UpdateRecordSchema = z.looseObject({
  platform: z.string().min(1),
  seriesId: z.string().min(1),
  seriesUrl: z.string(),
  title: z.string(),
  ended: z.boolean().default(false),
  latest: LatestIssueSchema.nullable().default(null),
  addedAt: z.string(),
  updatedAt: z.string(),
});

export type UpdateRecord = z.infer<typeof UpdateRecordSchema>;

/**
 * Update file structure
 */
export const UpdateFileSchema = z.looseObject({
  version: z.literal(UPDATE_FILE_VERSION),
  series: z.array(UpdateRecordSchema),
});

export type UpdateFile = z.infer<typeof UpdateFileSchema>;

/**
 * Create a new empty update file
 */
export function createEmptyUpdateFile(): UpdateFile {
  return { version: UPDATE_FILE_VERSION, series: [] };
}
