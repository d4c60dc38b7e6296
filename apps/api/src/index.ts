import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import { InMemoryAppendOnlyLogger } from '@tasklane/audit';
import { createApp } from './app.js';
import { loadConfig } from './config.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.join(__dirname, '../../../.env') });
dotenv.config();

const config = loadConfig();

const app = createApp({
    auditLogger: new InMemoryAppendOnlyLogger({ echo: config.auditEcho }),
    jsonBodyLimit: config.jsonBodyLimit,
});

app.listen(config.port, () => {
    console.log(`[API] Tasklane API listening on port ${config.port}`);
});
