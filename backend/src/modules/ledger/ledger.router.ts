import { Router, Response } from 'express';
import { ledgerService } from './ledger.module.js';
import { parseFieldValues } from './ledger.service.js';
import { resolveDateOrMonthKey } from '../../shared/utils/date.js';

const router = Router();

const handleError = (error: unknown, res: Response) => {
  if (error instanceof Error && error.message === 'INVALID_INPUT') {
    res.status(400).json({ code: 'invalid-input', message: 'Invalid ledger request.' });
    return;
  }
  console.error('Ledger storage failure:', error);
  res.status(500).json({ code: 'storage-unavailable', message: 'The ledger file could not be read or written.' });
};

const parseInteger = (value: unknown): number | null => {
  const numeric = typeof value === 'string' && value.trim() ? Number(value) : value;
  return typeof numeric === 'number' && Number.isInteger(numeric) ? numeric : null;
};

router.get('/fields', (_req, res) => {
  res.json(ledgerService.listFields());
});

router.get('/', async (_req, res) => {
  try {
    const table = await ledgerService.load();
    res.json({ fields: table.columns.slice(1), snapshots: ledgerService.toReportView(table) });
  } catch (error) {
    handleError(error, res);
  }
});

router.get('/report', async (_req, res) => {
  try {
    const table = await ledgerService.load();
    res.json(ledgerService.buildReport(table));
  } catch (error) {
    handleError(error, res);
  }
});

router.post('/entries', async (req, res) => {
  const { year, month, values } = (req.body ?? {}) as { year?: unknown; month?: unknown; values?: unknown };
  const parsedYear = parseInteger(year);
  const parsedMonth = parseInteger(month);
  if (parsedYear === null || parsedMonth === null) {
    res.status(400).json({ code: 'invalid-input', message: 'Provide a numeric year and month.' });
    return;
  }
  try {
    const table = await ledgerService.load();
    const result = await ledgerService.upsertMonth(table, parsedYear, parsedMonth, parseFieldValues(values));
    const snapshots = ledgerService.toReportView(result.table);
    if (result.outcome === 'rejected-duplicate') {
      res.status(409).json({
        code: 'duplicate',
        outcome: result.outcome,
        message: 'Data for this month already exists and cannot be overwritten.'
      });
      return;
    }
    res.status(result.outcome === 'created' ? 201 : 200).json({ outcome: result.outcome, snapshots });
  } catch (error) {
    handleError(error, res);
  }
});

router.delete('/entries/:date', async (req, res) => {
  const date = resolveDateOrMonthKey(req.params.date);
  if (!date) {
    res.status(400).json({ code: 'invalid-input', message: 'Provide a YYYY-MM-DD date or a YYYY-MM month.' });
    return;
  }
  try {
    const table = await ledgerService.load();
    const next = await ledgerService.delete(table, date);
    res.json({
      date,
      removed: next.snapshots.length !== table.snapshots.length,
      snapshots: ledgerService.toReportView(next)
    });
  } catch (error) {
    handleError(error, res);
  }
});

export { router as ledgerRouter };
