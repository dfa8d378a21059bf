import { Router } from 'express';
import bodyParser from 'body-parser';
import { createMessage, listMessages, markMessageRead } from '../db';
import { isOneOf, MESSAGE_TYPES } from '../enums';
import { isInvalid, sendError } from './helpers';

// Group chat for a trip, mounted under /api/trips.
const router = Router();
router.use(bodyParser.json());

router.get('/:tripId/messages', async (req, res) => {
  try {
    const messages = await listMessages(req.params.tripId);
    res.json(messages);
  } catch (err) {
    sendError(res, err, 'Failed to list messages');
  }
});

router.post('/:tripId/messages', async (req, res) => {
  const { senderId, content, messageType } = req.body ?? {};
  if (isInvalid(senderId) || isInvalid(content)) {
    res.status(400).json({ error: 'senderId and content are required' });
    return;
  }
  if (messageType !== undefined && !isOneOf(MESSAGE_TYPES, messageType)) {
    res.status(400).json({ error: `messageType must be one of ${MESSAGE_TYPES.join(', ')}` });
    return;
  }
  try {
    const message = await createMessage(req.params.tripId, {
      senderId: senderId.trim(),
      content: content.trim(),
      messageType,
    });
    res.status(201).json(message);
  } catch (err) {
    sendError(res, err, 'Failed to send message');
  }
});

router.post('/:tripId/messages/:messageId/read', async (req, res) => {
  const { userId } = req.body ?? {};
  if (isInvalid(userId)) {
    res.status(400).json({ error: 'userId is required' });
    return;
  }
  try {
    const receipt = await markMessageRead(req.params.tripId, req.params.messageId, userId.trim());
    res.json(receipt);
  } catch (err) {
    sendError(res, err, 'Failed to mark message as read');
  }
});

export default router;
