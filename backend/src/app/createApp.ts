import express from 'express';
import cors from 'cors';
import { registerAppRoutes } from './setupRoutes.js';

export const createApp = () => {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  registerAppRoutes(app);

  return app;
};
