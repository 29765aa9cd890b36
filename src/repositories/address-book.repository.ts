import fs from 'fs';
import path from 'path';
import { logger } from '../config/logger';
import type { AddressBookDocument } from '../models/contact.model';
import { ContactRecord } from '../services/address-book/contact-record';
import { CorruptDataError, StorageError, isErrnoException } from '../utils/errors';
import {
  ADDRESS_BOOK_VERSION,
  addressBookDocumentSchema,
} from '../validators/address-book.validators';

/**
 * Reads and writes the address book as a versioned JSON document:
 *
 *   { "version": 1, "savedAt": "...", "contacts": [{ "name", "phones", "birthday" }] }
 *
 * Contacts are stored in the order the book iterates them.
 */
export class AddressBookRepository {
  /**
   * Load all records from `filePath`.
   * A missing file yields an empty list; unreadable files throw StorageError
   * and invalid content throws CorruptDataError.
   */
  load(filePath: string): ContactRecord[] {
    let raw: string;
    try {
      raw = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        logger.info({ path: filePath }, 'Address book file not found, starting empty');
        return [];
      }
      logger.error({ error, path: filePath }, 'Failed to read address book');
      throw new StorageError(`Failed to read address book at ${filePath}`, { cause: error });
    }

    const document = this.parse(raw, filePath);
    const records = document.contacts.map((contact) => ContactRecord.fromDocument(contact));

    logger.info({ path: filePath, count: records.length }, 'Loaded address book');
    return records;
  }

  /**
   * Write all records to `filePath`, replacing whatever was there.
   * The document goes to a temp file first and is renamed over the target.
   */
  save(records: readonly ContactRecord[], filePath: string): void {
    const document: AddressBookDocument = {
      version: ADDRESS_BOOK_VERSION,
      savedAt: new Date().toISOString(),
      contacts: records.map((record) => record.toJSON()),
    };
    const tempPath = `${filePath}.${process.pid}.tmp`;

    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
      fs.renameSync(tempPath, filePath);
    } catch (error) {
      logger.error({ error, path: filePath }, 'Failed to save address book');
      try {
        fs.rmSync(tempPath, { force: true });
      } catch (cleanupError) {
        logger.warn({ error: cleanupError, path: tempPath }, 'Failed to remove temp file');
      }
      throw new StorageError(`Failed to save address book to ${filePath}`, { cause: error });
    }

    logger.info({ path: filePath, count: records.length }, 'Saved address book');
  }

  private parse(raw: string, filePath: string): AddressBookDocument {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.error({ path: filePath }, 'Address book is not valid JSON');
      throw new CorruptDataError(`Address book at ${filePath} is not valid JSON`, undefined, {
        cause: error,
      });
    }

    const result = addressBookDocumentSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.errors.map((err) => ({
        field: err.path.join('.'),
        message: err.message,
      }));
      logger.error({ path: filePath, issues }, 'Address book failed validation');
      throw new CorruptDataError(`Address book at ${filePath} is corrupt`, issues);
    }

    return result.data;
  }
}

export const addressBookRepository = new AddressBookRepository();
