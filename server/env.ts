/**
 * Environment loader - must be imported FIRST before any modules that read process.env
 */
import { config } from 'dotenv';

// .env.local takes precedence over .env
config({ path: '.env.local', debug: process.env.DEBUG === 'true' });
config({ path: '.env', debug: process.env.DEBUG === 'true' });

export const env = process.env;
