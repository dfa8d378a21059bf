import request from 'supertest';
import { randomUUID } from 'crypto';
import { app } from '../src/app';
import { initDb, closePool } from '../src/db';

describe('Trip chat', () => {
  let owner: { id: string };
  let guest: { id: string };
  let outsider: { id: string };
  let tripId: string;

  const createUser = async (username: string) =>
    (await request(app).post('/api/users').send({ email: `${username}@example.com`, username }).expect(201)).body;

  beforeAll(async () => {
    await initDb();
    owner = await createUser('chat-owner');
    guest = await createUser('chat-guest');
    outsider = await createUser('chat-outsider');
    const trip = await request(app)
      .post('/api/trips')
      .send({ name: 'Food tour', destination: 'Bangkok', createdById: owner.id })
      .expect(201);
    tripId = trip.body.id;
    await request(app).post(`/api/trips/${tripId}/members`).send({ userId: guest.id, status: 'accepted' }).expect(201);
  });

  afterAll(async () => {
    await closePool();
  });

  it('posts a message and records read receipts once per user', async () => {
    const sent = await request(app)
      .post(`/api/trips/${tripId}/messages`)
      .send({ senderId: owner.id, content: '  Street food tonight?  ' })
      .expect(201);
    expect(sent.body).toMatchObject({ tripId, senderId: owner.id, content: 'Street food tonight?', messageType: 'text', readBy: [] });

    const first = await request(app)
      .post(`/api/trips/${tripId}/messages/${sent.body.id}/read`)
      .send({ userId: guest.id })
      .expect(200);
    const second = await request(app)
      .post(`/api/trips/${tripId}/messages/${sent.body.id}/read`)
      .send({ userId: guest.id })
      .expect(200);
    expect(first.body).toMatchObject({ messageId: sent.body.id, userId: guest.id });
    expect(second.body.id).toBe(first.body.id);

    const list = await request(app).get(`/api/trips/${tripId}/messages`).expect(200);
    const message = list.body.find((m: { id: string }) => m.id === sent.body.id);
    expect(message.readBy).toEqual([guest.id]);
  });

  it('validates the message', async () => {
    const empty = await request(app)
      .post(`/api/trips/${tripId}/messages`)
      .send({ senderId: owner.id, content: '   ' })
      .expect(400);
    expect(empty.body).toEqual({ error: 'senderId and content are required' });

    await request(app)
      .post(`/api/trips/${tripId}/messages`)
      .send({ senderId: owner.id, content: 'Vote!', messageType: 'poll' })
      .expect(400);
  });

  it('only lets trip members post and read', async () => {
    const post = await request(app)
      .post(`/api/trips/${tripId}/messages`)
      .send({ senderId: outsider.id, content: 'Hello?' })
      .expect(400);
    expect(post.body).toEqual({ error: 'Sender is not a member of this trip' });

    const sent = await request(app)
      .post(`/api/trips/${tripId}/messages`)
      .send({ senderId: guest.id, content: 'Meet at the night market', messageType: 'location' })
      .expect(201);
    const read = await request(app)
      .post(`/api/trips/${tripId}/messages/${sent.body.id}/read`)
      .send({ userId: outsider.id })
      .expect(400);
    expect(read.body).toEqual({ error: 'Reader is not a member of this trip' });
  });

  it('returns 404 for unknown messages and trips', async () => {
    const malformed = await request(app)
      .post(`/api/trips/${tripId}/messages/nope/read`)
      .send({ userId: guest.id })
      .expect(404);
    expect(malformed.body).toEqual({ error: 'Message not found' });

    await request(app)
      .post(`/api/trips/${tripId}/messages/${randomUUID()}/read`)
      .send({ userId: guest.id })
      .expect(404);

    const trip = await request(app).get(`/api/trips/${randomUUID()}/messages`).expect(404);
    expect(trip.body).toEqual({ error: 'Trip not found' });
  });
});
