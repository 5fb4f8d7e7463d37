import { config } from 'dotenv';
import { join } from 'path';

/**
 * Load the .env file from the working directory. Values in the file take
 * precedence over variables already set in the environment.
 */
export function loadEnvFile(): boolean {
  const envPath = join(process.cwd(), '.env');

  const result = config({
    path: envPath,
    override: true,
  });

  return !result.error;
}
