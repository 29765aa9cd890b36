import { z } from 'zod';
import { parseIsoDate } from '../utils/date';

export const nameSchema = z.string({ invalid_type_error: 'Name must be a string' }).nullable();

export const phoneSchema = z
  .string({
    required_error: 'Phone is required',
    invalid_type_error: 'Phone must be a string',
  })
  .regex(/^\d+$/, 'Phone must contain only digits')
  .length(10, 'Phone must be 10 digits long');

export const birthdaySchema = z
  .string({ invalid_type_error: 'Birthday must be a string' })
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Invalid date format. Use 'YYYY-MM-DD'")
  .refine((value) => parseIsoDate(value) !== null, 'Invalid calendar date');

export const pageSizeSchema = z
  .number()
  .int('Page size must be an integer')
  .positive('Page size must be positive');
