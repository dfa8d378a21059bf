import { Router } from 'express';
import bodyParser from 'body-parser';
import { createExpense, deleteExpense, listExpenses, SplitInput } from '../db';
import { EXPENSE_CATEGORIES, isOneOf, PAYMENT_METHODS } from '../enums';
import { isDateOrEmpty, isInvalid, optionalString, sendError } from './helpers';

// Trip expenses API, mounted under /api/trips.
const router = Router();
router.use(bodyParser.json());

const readSplits = (value: unknown): SplitInput[] | null => {
  if (!Array.isArray(value)) return null;
  const splits: SplitInput[] = [];
  for (const item of value) {
    const userId = item?.userId;
    const amount = Number(item?.amount);
    if (isInvalid(userId) || !Number.isFinite(amount) || amount < 0) return null;
    splits.push({ userId: String(userId).trim(), amount });
  }
  return splits;
};

router.get('/:tripId/expenses', async (req, res) => {
  try {
    const expenses = await listExpenses(req.params.tripId);
    res.json(expenses);
  } catch (err) {
    sendError(res, err, 'Failed to list expenses');
  }
});

router.post('/:tripId/expenses', async (req, res) => {
  const { paidById, description, amount, currency, category, paymentMethod, expenseDate, splits } = req.body ?? {};
  const total = Number(amount);
  if (isInvalid(paidById) || isInvalid(description) || !Number.isFinite(total) || total <= 0) {
    res.status(400).json({ error: 'paidById, description and a positive amount are required' });
    return;
  }
  if (category !== undefined && !isOneOf(EXPENSE_CATEGORIES, category)) {
    res.status(400).json({ error: `category must be one of ${EXPENSE_CATEGORIES.join(', ')}` });
    return;
  }
  if (paymentMethod !== undefined && !isOneOf(PAYMENT_METHODS, paymentMethod)) {
    res.status(400).json({ error: `paymentMethod must be one of ${PAYMENT_METHODS.join(', ')}` });
    return;
  }
  if (!isDateOrEmpty(expenseDate)) {
    res.status(400).json({ error: 'expenseDate must be YYYY-MM-DD' });
    return;
  }
  const splitInputs = splits === undefined ? [] : readSplits(splits);
  if (!splitInputs) {
    res.status(400).json({ error: 'splits must be a list of { userId, amount }' });
    return;
  }
  try {
    const expense = await createExpense(req.params.tripId, {
      paidById: paidById.trim(),
      description: description.trim(),
      amount: total,
      currency: typeof currency === 'string' && currency.trim() ? currency.trim().toUpperCase() : undefined,
      category,
      paymentMethod,
      expenseDate: optionalString(expenseDate),
      splits: splitInputs,
    });
    res.status(201).json(expense);
  } catch (err) {
    sendError(res, err, 'Failed to create expense');
  }
});

router.delete('/:tripId/expenses/:expenseId', async (req, res) => {
  try {
    await deleteExpense(req.params.tripId, req.params.expenseId);
    res.status(204).send();
  } catch (err) {
    sendError(res, err, 'Failed to delete expense');
  }
});

export default router;
