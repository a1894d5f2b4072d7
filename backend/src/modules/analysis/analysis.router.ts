import { Router, Response } from 'express';
import { ledgerService } from '../ledger/ledger.module.js';
import { analysisService } from './analysis.module.js';
import type { AnalysisRequest } from './analysis.types.js';

const router = Router();

const handleError = (error: unknown, res: Response) => {
  if (error instanceof Error && error.message === 'INVALID_INPUT') {
    res.status(400).json({ code: 'invalid-input', message: 'Invalid analysis range, series or ratio set.' });
    return;
  }
  console.error('Failed to build the analysis:', error);
  res.status(500).json({ code: 'storage-unavailable', message: 'The ledger file could not be read.' });
};

const readString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

const parseSeries = (value: unknown): string[] | undefined => {
  const raw = Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : readString(value);
  if (raw === undefined) {
    return undefined;
  }
  const list = Array.isArray(raw) ? raw : raw.split(',');
  return list.map((item) => item.trim()).filter(Boolean);
};

const parseRequest = (query: Record<string, unknown>): AnalysisRequest => ({
  from: readString(query.from),
  to: readString(query.to),
  series: parseSeries(query.series),
  ratioSet: readString(query.set)
});

router.get('/options', async (_req, res) => {
  try {
    const table = await ledgerService.load();
    res.json(analysisService.listOptions(table));
  } catch (error) {
    handleError(error, res);
  }
});

router.get('/', async (req, res) => {
  try {
    const table = await ledgerService.load();
    res.json(analysisService.analyze(table, parseRequest(req.query)));
  } catch (error) {
    handleError(error, res);
  }
});

router.get('/ratios', async (req, res) => {
  try {
    const table = await ledgerService.load();
    const { window, ratioSet, ratios } = analysisService.analyze(table, { ...parseRequest(req.query), series: [] });
    res.json({ window, ratioSet, ratios });
  } catch (error) {
    handleError(error, res);
  }
});

export { router as analysisRouter };
