import { Router } from 'express';
import bodyParser from 'body-parser';
import { createTrip, deleteTrip, getTrip, listTrips, TripPatch, updateTrip } from '../db';
import { isOneOf, TRIP_STATUSES } from '../enums';
import { isDateOrEmpty, isInvalid, optionalNumber, optionalString, sendError } from './helpers';

// Trips API: create/list/update/delete trips.
const router = Router();
router.use(bodyParser.json());

type TripFields = { patch: TripPatch } | { error: string };

// Shared by create and update; only fields present in the body end up in the patch.
const readTripFields = (body: Record<string, unknown>): TripFields => {
  const { name, destination, description, startDate, endDate, groupSize, budget, currency, status } = body;
  const patch: TripPatch = {};

  if (name !== undefined) {
    if (isInvalid(name)) return { error: 'name must be a non-empty string' };
    patch.name = String(name).trim();
  }
  if (destination !== undefined) {
    if (isInvalid(destination)) return { error: 'destination must be a non-empty string' };
    patch.destination = String(destination).trim();
  }
  if (description !== undefined) patch.description = optionalString(description);
  if (!isDateOrEmpty(startDate) || !isDateOrEmpty(endDate)) {
    return { error: 'startDate and endDate must be YYYY-MM-DD' };
  }
  if (startDate !== undefined) patch.startDate = optionalString(startDate);
  if (endDate !== undefined) patch.endDate = optionalString(endDate);
  if (patch.startDate && patch.endDate && patch.endDate < patch.startDate) {
    return { error: 'endDate must not be before startDate' };
  }
  if (groupSize !== undefined) {
    const size = Number(groupSize);
    if (!Number.isInteger(size) || size < 1) return { error: 'groupSize must be a positive integer' };
    patch.groupSize = size;
  }
  if (budget !== undefined) {
    const amount = optionalNumber(budget);
    if (budget !== null && (amount == null || amount < 0)) return { error: 'budget must be a non-negative number' };
    patch.budget = amount;
  }
  if (currency !== undefined) {
    if (typeof currency !== 'string' || !/^[A-Za-z]{3}$/.test(currency.trim())) {
      return { error: 'currency must be a 3-letter code' };
    }
    patch.currency = currency.trim().toUpperCase();
  }
  if (status !== undefined) {
    if (!isOneOf(TRIP_STATUSES, status)) return { error: `status must be one of ${TRIP_STATUSES.join(', ')}` };
    patch.status = status;
  }
  return { patch };
};

router.get('/', async (req, res) => {
  const userId = typeof req.query.userId === 'string' ? req.query.userId.trim() : undefined;
  try {
    const trips = await listTrips(userId || undefined);
    res.json(trips);
  } catch (err) {
    sendError(res, err, 'Failed to list trips');
  }
});

router.post('/', async (req, res) => {
  const body = req.body ?? {};
  const { name, destination, createdById } = body;
  if (isInvalid(name) || isInvalid(destination) || isInvalid(createdById)) {
    res.status(400).json({ error: 'name, destination and createdById are required' });
    return;
  }
  const fields = readTripFields(body);
  if ('error' in fields) {
    res.status(400).json({ error: fields.error });
    return;
  }
  try {
    const trip = await createTrip({
      ...fields.patch,
      name: name.trim(),
      destination: destination.trim(),
      createdById: createdById.trim(),
    });
    res.status(201).json(trip);
  } catch (err) {
    sendError(res, err, 'Failed to create trip');
  }
});

router.get('/:id', async (req, res) => {
  try {
    const trip = await getTrip(req.params.id);
    if (!trip) {
      res.status(404).json({ error: 'Trip not found' });
      return;
    }
    res.json(trip);
  } catch (err) {
    sendError(res, err, 'Failed to load trip');
  }
});

router.patch('/:id', async (req, res) => {
  const fields = readTripFields(req.body ?? {});
  if ('error' in fields) {
    res.status(400).json({ error: fields.error });
    return;
  }
  try {
    const updated = await updateTrip(req.params.id, fields.patch);
    res.json(updated);
  } catch (err) {
    sendError(res, err, 'Failed to update trip');
  }
});

router.delete('/:id', async (req, res) => {
  try {
    await deleteTrip(req.params.id);
    res.status(204).send();
  } catch (err) {
    sendError(res, err, 'Failed to delete trip');
  }
});

export default router;
