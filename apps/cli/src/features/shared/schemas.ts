import { z } from 'zod';

export const GlobalOptionsSchema = z.object({
  db: z.string().min(1, '--db must not be empty').optional(),
  json: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export const ItemIdSchema = z.coerce
  .number({ invalid_type_error: 'Item id must be a number' })
  .int('Item id must be an integer')
  .positive('Item id must be positive');

export const AddCommandOptionsSchema = z.object({
  description: z.string({ required_error: '--description is required' }),
  location: z.string({ required_error: '--location is required' }),
  status: z.string({ required_error: '--status is required' }),
  remarks: z.string().default(''),
});

export const EditCommandOptionsSchema = z.object({
  description: z.string().optional(),
  location: z.string().optional(),
  status: z.string().optional(),
  remarks: z.string().optional(),
});

export const ListCommandOptionsSchema = z.object({
  after: z.coerce.number().int('--after must be an integer').nonnegative('--after must not be negative').optional(),
  limit: z.coerce.number().int('--limit must be an integer').positive('--limit must be positive').optional(),
});

export const InterchangeFormatSchema = z.enum(['csv', 'json'], {
  errorMap: () => ({ message: '--format must be csv or json' }),
});

export type InterchangeFormat = z.infer<typeof InterchangeFormatSchema>;

export const ExportCommandOptionsSchema = z.object({
  format: InterchangeFormatSchema.default('csv'),
  output: z.string().min(1).optional(),
});

export const ImportCommandOptionsSchema = z.object({
  format: InterchangeFormatSchema.optional(),
});
