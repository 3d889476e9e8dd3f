import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

import { createApp } from './app';
import { loadConfig } from './config';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Load root .env if present
dotenv.config({ path: path.join(__dirname, '../../../.env') });
// Fallback to local .env
dotenv.config();

const config = loadConfig();
const app = createApp({ config });

app.listen(config.port, () => {
  console.log(`Data integrity API running on ${config.port}`);
  if (!config.database) console.log('No database configured; includeDatabase requests will report it');
});
