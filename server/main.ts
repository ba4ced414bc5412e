import { loadConfig, type AppConfig } from '../api/_lib/config.js';
import { describeError } from '../api/_lib/errors.js';
import { createServer } from './index.js';

let appConfig: AppConfig;
try {
  appConfig = loadConfig();
} catch (error) {
  console.error(`Startup failed: ${describeError(error)}`);
  process.exit(1);
}

createServer(appConfig).listen(appConfig.port, () => {
  console.log(`Server listening on ${appConfig.port}`);
});
