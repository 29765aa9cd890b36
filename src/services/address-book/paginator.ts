import { ValidationError } from '../../utils/errors';
import { pageSizeSchema } from '../../validators/field.validators';
import type { ContactRecord } from './contact-record';

export const DEFAULT_PAGE_SIZE = 5;

/**
 * Cursor over a fixed list of records, handing out one page per call.
 * The list is captured when the paginator is created, so later changes
 * to the address book do not show up in a pagination already running.
 */
export class Paginator implements Iterable<ContactRecord[]> {
  private readonly records: readonly ContactRecord[];
  private offset = 0;
  private served = 0;

  constructor(
    records: readonly ContactRecord[],
    readonly pageSize: number = DEFAULT_PAGE_SIZE
  ) {
    const result = pageSizeSchema.safeParse(pageSize);
    if (!result.success) {
      throw ValidationError.fromZodError(result.error);
    }

    this.records = [...records];
  }

  get hasMore(): boolean {
    return this.offset < this.records.length;
  }

  /**
   * Number of pages handed out so far (the current page number)
   */
  get pageNumber(): number {
    return this.served;
  }

  get totalPages(): number {
    return Math.ceil(this.records.length / this.pageSize);
  }

  /**
   * Next page of up to `pageSize` records, null once exhausted
   */
  nextPage(): ContactRecord[] | null {
    if (!this.hasMore) {
      return null;
    }

    const page = this.records.slice(this.offset, this.offset + this.pageSize);
    this.offset += this.pageSize;
    this.served++;
    return page;
  }

  *[Symbol.iterator](): Iterator<ContactRecord[]> {
    let page = this.nextPage();
    while (page) {
      yield page;
      page = this.nextPage();
    }
  }
}
