import { z } from 'zod';

export const bookPackageSchema = z.object({
  jobId: z.string(),
  title: z.string(),
  productCode: z.string().nullable(),
  filename: z.string(),
  sourceContentType: z.string(),
  sizeBytes: z.number().int().min(0),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  markdown: z.string(),
});

export type BookPackage = z.infer<typeof bookPackageSchema>;

export type BookManifest = Omit<BookPackage, 'markdown'> & {
  markdownKey: string;
  publishedAt: string;
};
