import type { FieldKind } from '../../models/contact.model';
import { ValidationError } from '../../utils/errors';
import { birthdaySchema, nameSchema, phoneSchema } from '../../validators/field.validators';
import type { ZodTypeAny } from 'zod';

function check(schema: ZodTypeAny, value: unknown): void {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
}

/**
 * Throws ValidationError when `value` breaks the rule of the given field kind
 */
export function validateFieldValue(kind: FieldKind, value: string | null): void {
  switch (kind) {
    case 'name':
      check(nameSchema, value);
      return;
    case 'phone':
      check(phoneSchema, value);
      return;
    case 'birthday':
      // Absent birthday is allowed, a present one must be a real date
      if (value !== null) {
        check(birthdaySchema, value);
      }
      return;
    default: {
      const unknownKind: never = kind;
      throw new Error(`Unknown field kind: ${String(unknownKind)}`);
    }
  }
}

/**
 * A single scalar slot whose value always satisfies the rule of its kind.
 * Validation runs on construction and on every `set`; a rejected value
 * leaves the previous one in place.
 */
export class ValidatedField<K extends FieldKind> {
  private current: string | null;

  constructor(
    readonly kind: K,
    value: string | null = null
  ) {
    validateFieldValue(kind, value);
    this.current = value;
  }

  get(): string | null {
    return this.current;
  }

  set(value: string | null): void {
    validateFieldValue(this.kind, value);
    this.current = value;
  }

  toString(): string {
    return this.current ?? '';
  }
}

export type NameField = ValidatedField<'name'>;
export type PhoneField = ValidatedField<'phone'>;
export type BirthdayField = ValidatedField<'birthday'>;
