/**
 * Loads .env.local first, then .env for any missing variables.
 * Import before anything that reads process.env at module load.
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
