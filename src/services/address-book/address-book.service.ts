import { logger } from '../../config/logger';
import {
  addressBookRepository,
  type AddressBookRepository,
} from '../../repositories/address-book.repository';
import type { ContactRecord } from './contact-record';
import { DEFAULT_PAGE_SIZE, Paginator } from './paginator';

/**
 * Address Book
 *
 * Keyed collection of contact records. Keys are contact names: adding a
 * record under an existing name replaces the old record in place, so
 * listing order stays the order in which names were first added.
 */
export class AddressBook {
  private entries = new Map<string, ContactRecord>();

  constructor(private readonly repository: AddressBookRepository = addressBookRepository) {}

  get size(): number {
    return this.entries.size;
  }

  /**
   * Insert or fully replace the record stored under its name
   */
  add(record: ContactRecord): void {
    const name = record.name;
    const replaced = this.entries.has(name);
    this.entries.set(name, record);
    logger.debug({ replaced, size: this.entries.size }, 'Contact stored');
  }

  /**
   * Remove the record with exactly this name. Returns false when absent.
   */
  remove(name: string): boolean {
    const removed = this.entries.delete(name);
    if (removed) {
      logger.debug({ size: this.entries.size }, 'Contact removed');
    }
    return removed;
  }

  get(name: string): ContactRecord | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  records(): ContactRecord[] {
    return Array.from(this.entries.values());
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Case-insensitive substring match on contact names
   */
  findByName(query: string): ContactRecord[] {
    const needle = query.toLowerCase();
    return this.records().filter((record) => record.name.toLowerCase().includes(needle));
  }

  /**
   * Records with at least one phone containing `query`
   */
  findByPhone(query: string): ContactRecord[] {
    return this.records().filter((record) => record.phones.some((phone) => phone.includes(query)));
  }

  /**
   * Start a new pagination from the first record
   */
  paginate(pageSize: number = DEFAULT_PAGE_SIZE): Paginator {
    return new Paginator(this.records(), pageSize);
  }

  save(filePath: string): void {
    this.repository.save(this.records(), filePath);
  }

  /**
   * Replace all entries with the content of `filePath`. On failure the
   * current entries are kept and the error propagates.
   */
  load(filePath: string): void {
    const records = this.repository.load(filePath);

    const entries = new Map<string, ContactRecord>();
    for (const record of records) {
      entries.set(record.name, record);
    }
    this.entries = entries;
  }
}
