/**
 * Environment Configuration and Validation
 *
 * Validates all environment variables using Zod schema and provides
 * type-safe access to configuration values throughout the application.
 *
 * Every variable has a default, so the contact book runs without a .env file.
 *
 * @module config/environment
 */

import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

// Environment schema validation
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Persistence
  ADDRESS_BOOK_PATH: z.string().min(1).default('./data/address-book.json'),

  // Listing
  PAGE_SIZE: z.string().transform(Number).pipe(z.number().int().min(1)).default('5'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('warn'),
  LOG_PRETTY: z
    .string()
    .transform((val) => val === 'true')
    .default('true'),
});

// Parse and validate environment variables
function validateEnv() {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const invalidVars = error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
      console.error('Environment validation failed:');
      invalidVars.forEach((msg) => console.error(`  - ${msg}`));
      console.error('\nPlease check your .env file.');
      process.exit(1);
    }
    throw error;
  }
}

// Export validated environment
export const env = validateEnv();
