import { z } from "zod";

/**
 * The parts of an S3 notification the summarizer reads. Only the first record is processed.
 */
export const uploadEventSchema = z.object({
  Records: z
    .array(
      z.object({
        s3: z.object({
          bucket: z.object({ name: z.string().min(1) }),
          object: z.object({ key: z.string().min(1) }),
        }),
      })
    )
    .min(1),
});

export type UploadEvent = z.infer<typeof uploadEventSchema>;
