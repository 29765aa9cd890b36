import type { ContactDocument } from '../../models/contact.model';
import { daysUntilAnniversary, parseIsoDate } from '../../utils/date';
import { ValidatedField, type BirthdayField, type NameField, type PhoneField } from './field';

/**
 * One contact: a name, any number of phones (insertion order, duplicates
 * allowed) and an optional birthday
 */
export class ContactRecord {
  private readonly nameField: NameField;
  readonly birthday: BirthdayField;
  private phoneFields: PhoneField[] = [];

  /**
   * Empty phone or birthday strings count as not given
   */
  constructor(name: string, phone?: string | null, birthday?: string | null) {
    this.nameField = new ValidatedField('name', name);
    this.birthday = new ValidatedField('birthday', birthday ? birthday : null);

    if (phone) {
      this.addPhone(phone);
    }
  }

  /**
   * Rebuild a record from its persisted shape
   */
  static fromDocument(document: ContactDocument): ContactRecord {
    const record = new ContactRecord(document.name, null, document.birthday);
    document.phones.forEach((phone) => record.addPhone(phone));
    return record;
  }

  /**
   * Set once at construction; the address book keys records by it
   */
  get name(): string {
    return this.nameField.toString();
  }

  get phones(): string[] {
    return this.phoneFields.map((phone) => phone.toString());
  }

  get birthdayValue(): string | null {
    return this.birthday.get();
  }

  addPhone(phone: string): void {
    // Constructing the field validates before anything is appended
    this.phoneFields.push(new ValidatedField('phone', phone));
  }

  removePhone(phone: string): void {
    this.phoneFields = this.phoneFields.filter((field) => field.toString() !== phone);
  }

  /**
   * Replace every entry equal to `oldPhone`. Without a match nothing is
   * validated and nothing changes.
   */
  editPhone(oldPhone: string, newPhone: string): void {
    for (const field of this.phoneFields) {
      if (field.toString() === oldPhone) {
        field.set(newPhone);
      }
    }
  }

  hasPhone(phone: string): boolean {
    return this.phoneFields.some((field) => field.toString() === phone);
  }

  /**
   * Set or clear (null) the birthday
   */
  setBirthday(birthday: string | null): void {
    this.birthday.set(birthday);
  }

  /**
   * Days from `today` until the next birthday, 0 on the day itself,
   * null when no birthday is set
   */
  daysToNextBirthday(today: Date = new Date()): number | null {
    const value = this.birthday.get();
    if (value === null) {
      return null;
    }

    const date = parseIsoDate(value);
    if (!date) {
      return null;
    }

    return daysUntilAnniversary(date.month, date.day, today);
  }

  render(): string {
    return `Name: ${this.name}, Phones: ${this.phones.join(', ')}, Birthday: ${
      this.birthday.get() ?? 'N/A'
    }`;
  }

  toJSON(): ContactDocument {
    return {
      name: this.name,
      phones: this.phones,
      birthday: this.birthday.get(),
    };
  }
}
