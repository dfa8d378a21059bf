import { Router } from 'express';
import bodyParser from 'body-parser';
import { addActivity, deleteActivity, listActivities, updateActivityStatus } from '../db';
import { ACTIVITY_CATEGORIES, ACTIVITY_STATUSES, isOneOf } from '../enums';
import { isDateOrEmpty, isInvalid, optionalNumber, optionalString, sendError } from './helpers';

// Saved activities for a trip, mounted under /api/trips. Suggestions from the
// planner can be stored here once the group picks them.
const router = Router();
router.use(bodyParser.json());

router.get('/:tripId/activities', async (req, res) => {
  try {
    const activities = await listActivities(req.params.tripId);
    res.json(activities);
  } catch (err) {
    sendError(res, err, 'Failed to list activities');
  }
});

router.post('/:tripId/activities', async (req, res) => {
  const { name, category, status, address, rating, url, price, scheduledDate, createdById } = req.body ?? {};
  if (isInvalid(name)) {
    res.status(400).json({ error: 'name is required' });
    return;
  }
  if (category !== undefined && !isOneOf(ACTIVITY_CATEGORIES, category)) {
    res.status(400).json({ error: `category must be one of ${ACTIVITY_CATEGORIES.join(', ')}` });
    return;
  }
  if (status !== undefined && !isOneOf(ACTIVITY_STATUSES, status)) {
    res.status(400).json({ error: `status must be one of ${ACTIVITY_STATUSES.join(', ')}` });
    return;
  }
  const ratingValue = optionalNumber(rating);
  if (rating != null && (ratingValue == null || ratingValue < 0 || ratingValue > 5)) {
    res.status(400).json({ error: 'rating must be between 0 and 5' });
    return;
  }
  if (!isDateOrEmpty(scheduledDate)) {
    res.status(400).json({ error: 'scheduledDate must be YYYY-MM-DD' });
    return;
  }
  try {
    const activity = await addActivity(req.params.tripId, {
      name: name.trim(),
      category,
      status,
      address: optionalString(address),
      rating: ratingValue,
      url: optionalString(url),
      price: optionalString(price),
      scheduledDate: optionalString(scheduledDate),
      createdById: optionalString(createdById),
    });
    res.status(201).json(activity);
  } catch (err) {
    sendError(res, err, 'Failed to add activity');
  }
});

router.patch('/:tripId/activities/:activityId', async (req, res) => {
  const { status } = req.body ?? {};
  if (!isOneOf(ACTIVITY_STATUSES, status)) {
    res.status(400).json({ error: `status must be one of ${ACTIVITY_STATUSES.join(', ')}` });
    return;
  }
  try {
    const activity = await updateActivityStatus(req.params.tripId, req.params.activityId, status);
    res.json(activity);
  } catch (err) {
    sendError(res, err, 'Failed to update activity');
  }
});

router.delete('/:tripId/activities/:activityId', async (req, res) => {
  try {
    await deleteActivity(req.params.tripId, req.params.activityId);
    res.status(204).send();
  } catch (err) {
    sendError(res, err, 'Failed to delete activity');
  }
});

export default router;
