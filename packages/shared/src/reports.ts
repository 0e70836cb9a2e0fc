import { z } from "zod";

export const datasetBucketSchema = z
  .object({
    files: z.number().int().min(0),
    dataBefore: z.number().int().min(0),
    dataAfter: z.number().int().min(0),
    removed: z.number().int().min(0),
  })
  .strict();
export type DatasetBucket = z.infer<typeof datasetBucketSchema>;

export const datasetErrorDetailSchema = z
  .object({
    file: z.string().min(1),
    removed: z.number().int().min(0),
    errors: z.array(z.string()),
  })
  .strict();
export type DatasetErrorDetail = z.infer<typeof datasetErrorDetailSchema>;

export const datasetCheckReportSchema = z
  .object({
    generatedAt: z.string().min(1),
    dataRoot: z.string().min(1),
    dryRun: z.boolean(),
    totalFiles: z.number().int().min(0),
    totalBefore: z.number().int().min(0),
    totalAfter: z.number().int().min(0),
    totalRemoved: z.number().int().min(0),
    filesWithRemovals: z.number().int().min(0),
    byDomain: z.record(datasetBucketSchema),
    byRound: z.record(datasetBucketSchema),
    byAmbiguityType: z.record(datasetBucketSchema),
    errorDetails: z.array(datasetErrorDetailSchema),
  })
  .strict();
export type DatasetCheckReport = z.infer<typeof datasetCheckReportSchema>;

export function parseDatasetCheckReport(payload: unknown): DatasetCheckReport {
  return datasetCheckReportSchema.parse(payload);
}
