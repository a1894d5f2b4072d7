import { runtimeConfig } from '../../shared/config/runtimeConfig.js';
import { ledgerService } from '../ledger/ledger.module.js';
import { AnalysisService } from './analysis.service.js';

export const analysisService = new AnalysisService(ledgerService, {
  displayScale: runtimeConfig.displayScale,
  amountPrefix: runtimeConfig.amountPrefix
});
