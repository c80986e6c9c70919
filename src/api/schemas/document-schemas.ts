import { z } from 'zod';

const formValueSchema = z.union([z.string().max(4000), z.number(), z.boolean(), z.null()]);

export const registerDocumentSchema = z.object({
  hashCode: z.string().min(1).optional(),
  typePrefix: z.string().regex(/^[A-Za-z]{2}$/, 'typePrefix must be two letters').optional(),
  ownerNamespace: z.string().min(1).max(128),
  contentHash: z.string().regex(/^[a-fA-F0-9]{64}$/, 'contentHash must be a hex SHA-256 digest').optional(),
  // Raw document bytes; hashed when contentHash is absent
  contentBase64: z.string().min(1).optional(),
  clientName: z.string().max(500).optional(),
  documentType: z.string().max(100).optional(),
  documentTypeDisplay: z.string().max(200).optional(),
  fileName: z.string().max(255).optional(),
  fileSize: z.number().int().nonnegative().optional(),
  formData: z.record(formValueSchema).optional(),
  overwrite: z.boolean().default(false),
});

export type RegisterDocumentBody = z.infer<typeof registerDocumentSchema>;

export const integrityQuerySchema = z.object({
  hash_code: z.string().min(1, 'hash_code is required'),
});

export const searchQuerySchema = z.object({
  q: z.string().min(3, 'q must be at least 3 characters'),
  limit: z.string().regex(/^\d+$/).transform(Number).default('10'),
});
