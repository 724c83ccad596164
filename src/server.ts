import dotenv from 'dotenv';
import { createApp } from './app';
import { loadAppConfig } from './config';
import { errorMessage } from './errors';
import { createSearchRuntime } from './search';

dotenv.config();

const config = loadAppConfig();
const runtime = createSearchRuntime(config);
const app = createApp(runtime.service, runtime.history);

const server = app.listen(config.port, () => {
  console.log(`[Jobs] Server running on http://localhost:${config.port}`);
});

function shutdown(signal: string): void {
  console.log(`[Jobs] ${signal} received, shutting down...`);
  server.close();
  runtime.close().then(
    () => process.exit(0),
    error => {
      console.error('[Jobs] Shutdown failed:', errorMessage(error));
      process.exit(1);
    },
  );
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
