import { Router } from 'express';
import bodyParser from 'body-parser';
import { addTripMember, listTripMembers, removeTripMember, updateTripMember } from '../db';
import { isOneOf, TRIP_MEMBER_STATUSES } from '../enums';
import { isInvalid, sendError } from './helpers';

// Trip members API, mounted under /api/trips. Owners are created with the trip itself.
const router = Router();
router.use(bodyParser.json());

const ASSIGNABLE_ROLES = ['admin', 'member'] as const;

router.get('/:tripId/members', async (req, res) => {
  try {
    const members = await listTripMembers(req.params.tripId);
    res.json(members);
  } catch (err) {
    sendError(res, err, 'Failed to list members');
  }
});

router.post('/:tripId/members', async (req, res) => {
  const { userId, role, status } = req.body ?? {};
  if (isInvalid(userId)) {
    res.status(400).json({ error: 'userId is required' });
    return;
  }
  if (role !== undefined && !isOneOf(ASSIGNABLE_ROLES, role)) {
    res.status(400).json({ error: `role must be one of ${ASSIGNABLE_ROLES.join(', ')}` });
    return;
  }
  if (status !== undefined && !isOneOf(TRIP_MEMBER_STATUSES, status)) {
    res.status(400).json({ error: `status must be one of ${TRIP_MEMBER_STATUSES.join(', ')}` });
    return;
  }
  try {
    const member = await addTripMember(req.params.tripId, { userId: userId.trim(), role, status });
    res.status(201).json(member);
  } catch (err) {
    sendError(res, err, 'Failed to add member');
  }
});

router.patch('/:tripId/members/:memberId', async (req, res) => {
  const { role, status } = req.body ?? {};
  if (role === undefined && status === undefined) {
    res.status(400).json({ error: 'role or status is required' });
    return;
  }
  if (role !== undefined && !isOneOf(ASSIGNABLE_ROLES, role)) {
    res.status(400).json({ error: `role must be one of ${ASSIGNABLE_ROLES.join(', ')}` });
    return;
  }
  if (status !== undefined && !isOneOf(TRIP_MEMBER_STATUSES, status)) {
    res.status(400).json({ error: `status must be one of ${TRIP_MEMBER_STATUSES.join(', ')}` });
    return;
  }
  try {
    const member = await updateTripMember(req.params.tripId, req.params.memberId, { role, status });
    res.json(member);
  } catch (err) {
    sendError(res, err, 'Failed to update member');
  }
});

router.delete('/:tripId/members/:memberId', async (req, res) => {
  try {
    await removeTripMember(req.params.tripId, req.params.memberId);
    res.status(204).send();
  } catch (err) {
    sendError(res, err, 'Failed to remove member');
  }
});

export default router;
