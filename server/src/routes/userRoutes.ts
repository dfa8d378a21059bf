import { Router } from 'express';
import bodyParser from 'body-parser';
import { createUser, getUser } from '../db';
import { isInvalid, optionalString, sendError } from './helpers';

const router = Router();
router.use(bodyParser.json());

router.post('/', async (req, res) => {
  const { email, username, fullName } = req.body ?? {};
  if (isInvalid(email, 5) || !String(email).includes('@') || isInvalid(username, 2)) {
    res.status(400).json({ error: 'email and username (min 2 chars) are required' });
    return;
  }
  try {
    const user = await createUser({
      email: email.trim().toLowerCase(),
      username: username.trim(),
      fullName: optionalString(fullName) ?? null,
    });
    res.status(201).json(user);
  } catch (err) {
    sendError(res, err, 'Failed to create user');
  }
});

router.get('/:id', async (req, res) => {
  try {
    const user = await getUser(req.params.id);
    if (!user) {
      res.status(404).json({ error: 'User not found' });
      return;
    }
    res.json(user);
  } catch (err) {
    sendError(res, err, 'Failed to load user');
  }
});

export default router;
