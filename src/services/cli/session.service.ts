import { logger } from '../../config/logger';
import { AppError, ValidationError } from '../../utils/errors';
import type { AddressBook } from '../address-book/address-book.service';
import { ContactRecord } from '../address-book/contact-record';
import { DEFAULT_PAGE_SIZE, type Paginator } from '../address-book/paginator';
import { commandParser, type CommandParser } from './command-parser';

/**
 * How the session talks to the user
 */
export interface SessionIO {
  ask(question: string): Promise<string>;
  print(line: string): void;
}

export type SessionOutcome = 'continue' | 'exit';

export interface SessionOptions {
  pageSize?: number;
  parser?: CommandParser;
  /** Where `exit` saves the book; without it `exit` leaves at once */
  savePath?: string;
}

const MORE_PAGES_HINT = "More pages available. Type 'next' to see more.";

/**
 * Contact Manager Session
 *
 * Runs one command per call against the address book, asking follow-up
 * questions through the injected IO. Application errors are reported to the
 * user and the session carries on; anything else propagates.
 */
export class ContactManagerSession {
  private readonly pageSize: number;
  private readonly parser: CommandParser;
  private readonly savePath: string | undefined;
  private paginator: Paginator | null = null;

  constructor(
    private readonly addressBook: AddressBook,
    private readonly io: SessionIO,
    options: SessionOptions = {}
  ) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.parser = options.parser ?? commandParser;
    this.savePath = options.savePath;
  }

  async handle(input: string): Promise<SessionOutcome> {
    const command = this.parser.parse(input);

    try {
      switch (command) {
        case 'exit':
          // A failed save raises an AppError below and the session stays open
          if (this.savePath !== undefined) {
            this.addressBook.save(this.savePath);
          }
          return 'exit';
        case 'add':
          await this.addContact();
          break;
        case 'remove':
          await this.removeContact();
          break;
        case 'find by name':
          await this.findByName();
          break;
        case 'find by phone':
          await this.findByPhone();
          break;
        case 'show all':
          this.showAll();
          break;
        case 'next':
          this.showNextPage();
          break;
        case 'add phone':
          await this.addPhone();
          break;
        case 'edit phone':
          await this.editPhone();
          break;
        case 'remove phone':
          await this.removePhone();
          break;
        case 'birthday':
          await this.showBirthday();
          break;
        case 'help':
          this.io.print(`Available commands: ${this.parser.commands().join(', ')}`);
          break;
        case 'unknown':
          this.io.print('Invalid command. Try again.');
          break;
      }
    } catch (error) {
      if (error instanceof AppError) {
        logger.warn({ command, code: error.code }, 'Command failed');
        this.io.print(`Error: ${error.message}`);
        return 'continue';
      }
      throw error;
    }

    return 'continue';
  }

  private async ask(question: string): Promise<string> {
    return (await this.io.ask(question)).trim();
  }

  private async addContact(): Promise<void> {
    const name = await this.ask('Enter a name: ');
    if (!name) {
      this.io.print('Name cannot be empty.');
      return;
    }

    const birthday = await this.ask('Enter a birthday (optional, format YYYY-MM-DD): ');
    const record = new ContactRecord(name, null, birthday);

    for (;;) {
      const phone = await this.ask('Enter a phone (leave empty to finish): ');
      if (!phone) {
        break;
      }
      try {
        record.addPhone(phone);
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error;
        }
        this.io.print(`Error: ${error.message}`);
      }
    }

    this.addressBook.add(record);
    this.io.print(`Contact ${name} saved.`);
  }

  private async removeContact(): Promise<void> {
    const name = await this.ask('Enter a name to remove: ');
    if (this.addressBook.remove(name)) {
      this.io.print(`Contact ${name} removed.`);
    } else {
      this.io.print(`Contact ${name} not found.`);
    }
  }

  private async findByName(): Promise<void> {
    const query = await this.ask('Enter a name to find: ');
    this.printMatches(this.addressBook.findByName(query));
  }

  private async findByPhone(): Promise<void> {
    const query = await this.ask('Enter a phone to find: ');
    this.printMatches(this.addressBook.findByPhone(query));
  }

  private printMatches(records: ContactRecord[]): void {
    if (records.length === 0) {
      this.io.print('No matching records found.');
      return;
    }
    records.forEach((record) => this.io.print(record.render()));
  }

  private showAll(): void {
    if (this.addressBook.size === 0) {
      this.paginator = null;
      this.io.print('No contacts saved.');
      return;
    }

    this.paginator = this.addressBook.paginate(this.pageSize);
    this.printNextPage(this.paginator);
  }

  private showNextPage(): void {
    if (!this.paginator || !this.paginator.hasMore) {
      this.io.print('No more pages.');
      return;
    }
    this.printNextPage(this.paginator);
  }

  private printNextPage(paginator: Paginator): void {
    const page = paginator.nextPage();
    if (!page) {
      return;
    }

    this.io.print(`Page ${paginator.pageNumber}:`);
    page.forEach((record) => this.io.print(record.render()));
    if (paginator.hasMore) {
      this.io.print(MORE_PAGES_HINT);
    }
  }

  /**
   * Ask for a name and return the stored record, reporting when it is missing
   */
  private async askForContact(): Promise<ContactRecord | null> {
    const name = await this.ask('Enter a name: ');
    const record = this.addressBook.get(name);
    if (!record) {
      this.io.print(`Contact ${name} not found.`);
      return null;
    }
    return record;
  }

  private async addPhone(): Promise<void> {
    const record = await this.askForContact();
    if (!record) return;

    const phone = await this.ask('Enter a phone: ');
    record.addPhone(phone);
    this.io.print('Phone added.');
  }

  private async editPhone(): Promise<void> {
    const record = await this.askForContact();
    if (!record) return;

    const oldPhone = await this.ask('Enter the phone to change: ');
    if (!record.hasPhone(oldPhone)) {
      this.io.print(`Phone ${oldPhone} not found.`);
      return;
    }

    const newPhone = await this.ask('Enter the new phone: ');
    record.editPhone(oldPhone, newPhone);
    this.io.print('Phone updated.');
  }

  private async removePhone(): Promise<void> {
    const record = await this.askForContact();
    if (!record) return;

    const phone = await this.ask('Enter the phone to remove: ');
    if (!record.hasPhone(phone)) {
      this.io.print(`Phone ${phone} not found.`);
      return;
    }

    record.removePhone(phone);
    this.io.print('Phone removed.');
  }

  private async showBirthday(): Promise<void> {
    const record = await this.askForContact();
    if (!record) return;

    const name = record.name;
    const days = record.daysToNextBirthday();
    if (days === null) {
      this.io.print(`${name} has no birthday set.`);
      return;
    }
    this.io.print(`${name} has a birthday in ${days} ${days === 1 ? 'day' : 'days'}.`);
  }
}
