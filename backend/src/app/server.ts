import { createApp } from './createApp.js';
import { runtimeConfig } from '../shared/config/runtimeConfig.js';
import { ledgerService } from '../modules/ledger/ledger.module.js';

const bootstrap = async () => {
  // The data directory must exist before the first write
  await ledgerService.ensureStorage();

  const app = createApp();
  const { port, dataDirectory, ledgerFileName, duplicatePolicy } = runtimeConfig;

  app.listen(port, () => {
    console.log(`Ledger API is running on port ${port}`);
    console.log(`Storing snapshots in ${dataDirectory}/${ledgerFileName} (duplicate policy: ${duplicatePolicy})`);
  });
};

bootstrap().catch((error) => {
  console.error('Failed to start the server:', error);
  process.exit(1);
});
