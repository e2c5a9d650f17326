import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load environment variables
dotenv.config({ path: join(__dirname, '../.env') });

export const config = {
  watch: {
    readyTimeout: parseInt(process.env.OASIS_READY_TIMEOUT_MS || '10000', 10),
  },
  cloud: {
    accessToken: process.env.OASIS_ACCESS_TOKEN || undefined,
  },
};
