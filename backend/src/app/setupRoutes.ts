import { Application } from 'express';
import { healthRouter } from '../shared/health.router.js';
import { ledgerRouter } from '../modules/ledger/ledger.router.js';
import { analysisRouter } from '../modules/analysis/analysis.router.js';

export const registerAppRoutes = (app: Application) => {
  app.use('/health', healthRouter);
  app.use('/ledger', ledgerRouter);
  app.use('/analysis', analysisRouter);
};
