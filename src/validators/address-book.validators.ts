import { z } from 'zod';
import { birthdaySchema, phoneSchema } from './field.validators';

export const ADDRESS_BOOK_VERSION = 1;

export const contactDocumentSchema = z.object({
  name: z.string(),
  phones: z.array(phoneSchema),
  birthday: birthdaySchema.nullable(),
});

export const addressBookDocumentSchema = z.object({
  version: z.literal(ADDRESS_BOOK_VERSION),
  savedAt: z.string().optional(),
  contacts: z.array(contactDocumentSchema),
});
