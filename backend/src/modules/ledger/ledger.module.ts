import path from 'path';
import { runtimeConfig } from '../../shared/config/runtimeConfig.js';
import { LedgerRepository } from './ledger.repository.js';
import { LedgerService } from './ledger.service.js';

const repository = new LedgerRepository(path.join(runtimeConfig.dataDirectory, runtimeConfig.ledgerFileName));
export const ledgerService = new LedgerService(repository, {
  duplicatePolicy: runtimeConfig.duplicatePolicy,
  displayScale: runtimeConfig.displayScale,
  amountPrefix: runtimeConfig.amountPrefix
});
