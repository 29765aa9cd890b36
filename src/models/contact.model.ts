import type { z } from 'zod';
import type {
  addressBookDocumentSchema,
  contactDocumentSchema,
} from '../validators/address-book.validators';

export type FieldKind = 'name' | 'phone' | 'birthday';

/**
 * One contact as written to the address book file
 */
export type ContactDocument = z.infer<typeof contactDocumentSchema>;

/**
 * Versioned address book file
 */
export type AddressBookDocument = z.infer<typeof addressBookDocumentSchema>;
