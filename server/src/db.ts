// server/src/db.ts
import { Pool, PoolClient } from 'pg';
import { randomUUID } from 'crypto';
import {
  ACTIVITY_CATEGORIES,
  ACTIVITY_STATUSES,
  ActivityCategory,
  ActivityStatus,
  EXPENSE_CATEGORIES,
  ExpenseCategory,
  MESSAGE_TYPES,
  MessageType,
  PAYMENT_METHODS,
  PaymentMethod,
  TRIP_MEMBER_ROLES,
  TRIP_MEMBER_STATUSES,
  TRIP_STATUSES,
  TripMemberRole,
  TripMemberStatus,
  TripStatus,
  checkList,
} from './enums';
import { RecordError } from './errors';
import { Expense, ExpenseSplit, Message, MessageRead, Trip, TripActivity, TripMember, User } from './types';


let pool: Pool | null = null;


function getPool(): Pool {
  if (!pool) {
    const cs = process.env.DATABASE_URL;


    // Fail fast with a clear error instead of the SCRAM message
    if (typeof cs !== 'string' || cs.trim().length === 0) {
      throw new Error(
        `DATABASE_URL is missing or not a string. Got type=${typeof cs}, value=${String(cs)}`
      );
    }


    pool = new Pool({ connectionString: cs });
  }
  return pool;
}

export const closePool = async (): Promise<void> => {
  if (pool) {
    const p = pool;
    pool = null;
    await p.end();
  }
};

const withTransaction = async <T>(work: (client: PoolClient) => Promise<T>): Promise<T> => {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
};


export const initDb = async (): Promise<void> => {
  const p = getPool();

  await p.query(`
    CREATE TABLE IF NOT EXISTS users (
      id UUID PRIMARY KEY,
      email TEXT UNIQUE NOT NULL,
      username TEXT UNIQUE NOT NULL,
      full_name TEXT,
      created_at TIMESTAMP NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMP NOT NULL DEFAULT NOW()
    );
  `);

  await p.query(`
    CREATE TABLE IF NOT EXISTS trips (
      id UUID PRIMARY KEY,
      name TEXT NOT NULL,
      description TEXT,
      destination TEXT NOT NULL,
      start_date DATE,
      end_date DATE,
      group_size INTEGER NOT NULL DEFAULT 1,
      budget NUMERIC,
      currency TEXT NOT NULL DEFAULT 'AUD',
      status TEXT NOT NULL DEFAULT 'planned' CHECK (status IN (${checkList(TRIP_STATUSES)})),
      created_by_id UUID NOT NULL REFERENCES users(id),
      created_at TIMESTAMP NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMP NOT NULL DEFAULT NOW()
    );
  `);

  await p.query(`
    CREATE TABLE IF NOT EXISTS trip_members (
      id UUID PRIMARY KEY,
      trip_id UUID NOT NULL REFERENCES trips(id) ON DELETE CASCADE,
      user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      role TEXT NOT NULL DEFAULT 'member' CHECK (role IN (${checkList(TRIP_MEMBER_ROLES)})),
      status TEXT NOT NULL DEFAULT 'invited' CHECK (status IN (${checkList(TRIP_MEMBER_STATUSES)})),
      joined_at TIMESTAMP,
      created_at TIMESTAMP NOT NULL DEFAULT NOW(),
      UNIQUE (trip_id, user_id)
    );
  `);

  await p.query(`
    CREATE TABLE IF NOT EXISTS activities (
      id UUID PRIMARY KEY,
      trip_id UUID NOT NULL REFERENCES trips(id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      category TEXT NOT NULL DEFAULT 'other' CHECK (category IN (${checkList(ACTIVITY_CATEGORIES)})),
      status TEXT NOT NULL DEFAULT 'planned' CHECK (status IN (${checkList(ACTIVITY_STATUSES)})),
      address TEXT,
      rating DOUBLE PRECISION,
      url TEXT,
      price TEXT,
      scheduled_date DATE,
      created_by_id UUID REFERENCES users(id) ON DELETE SET NULL,
      created_at TIMESTAMP NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMP NOT NULL DEFAULT NOW()
    );
  `);

  await p.query(`
    CREATE TABLE IF NOT EXISTS expenses (
      id UUID PRIMARY KEY,
      trip_id UUID NOT NULL REFERENCES trips(id) ON DELETE CASCADE,
      paid_by_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      description TEXT NOT NULL,
      amount NUMERIC NOT NULL,
      currency TEXT NOT NULL DEFAULT 'AUD',
      category TEXT NOT NULL DEFAULT 'other' CHECK (category IN (${checkList(EXPENSE_CATEGORIES)})),
      payment_method TEXT NOT NULL DEFAULT 'other' CHECK (payment_method IN (${checkList(PAYMENT_METHODS)})),
      expense_date DATE,
      created_at TIMESTAMP NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMP NOT NULL DEFAULT NOW()
    );
  `);

  await p.query(`
    CREATE TABLE IF NOT EXISTS expense_splits (
      id UUID PRIMARY KEY,
      expense_id UUID NOT NULL REFERENCES expenses(id) ON DELETE CASCADE,
      user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      amount NUMERIC NOT NULL,
      UNIQUE (expense_id, user_id)
    );
  `);

  await p.query(`
    CREATE TABLE IF NOT EXISTS messages (
      id UUID PRIMARY KEY,
      trip_id UUID NOT NULL REFERENCES trips(id) ON DELETE CASCADE,
      sender_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      content TEXT NOT NULL,
      message_type TEXT NOT NULL DEFAULT 'text' CHECK (message_type IN (${checkList(MESSAGE_TYPES)})),
      created_at TIMESTAMP NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMP NOT NULL DEFAULT NOW()
    );
  `);

  await p.query(`
    CREATE TABLE IF NOT EXISTS message_reads (
      id UUID PRIMARY KEY,
      message_id UUID NOT NULL REFERENCES messages(id) ON DELETE CASCADE,
      user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      read_at TIMESTAMP NOT NULL DEFAULT NOW(),
      UNIQUE (message_id, user_id)
    );
  `);
};

// Children first so foreign keys never block a drop.
const TABLES_IN_DROP_ORDER = [
  'message_reads',
  'messages',
  'expense_splits',
  'expenses',
  'activities',
  'trip_members',
  'trips',
  'users',
];

export const dropDb = async (): Promise<void> => {
  const p = getPool();
  for (const table of TABLES_IN_DROP_ORDER) {
    await p.query(`DROP TABLE IF EXISTS ${table}`);
  }
};


type DbDate = Date | string;
type DbNumber = number | string;

const toTimestamp = (value: DbDate): string => (value instanceof Date ? value.toISOString() : String(value));

const toDateOnly = (value: DbDate | null): string | null => {
  if (value == null) return null;
  return value instanceof Date ? value.toISOString().slice(0, 10) : String(value).slice(0, 10);
};

const toNumber = (value: DbNumber | null): number | null => (value == null ? null : Number(value));

const toCents = (amount: number): number => Math.round(amount * 100);

export const isWholeCents = (amount: number): boolean => Math.abs(amount * 100 - toCents(amount)) < 1e-6;

// 23505 is Postgres' unique_violation; a concurrent insert can get past the existence check.
const isUniqueViolation = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// Postgres rejects malformed UUIDs with a syntax error; report them as missing records instead.
const assertId = (value: string, label: string): void => {
  if (!UUID_PATTERN.test(value)) throw new RecordError(`${label} not found`, 'NOT_FOUND');
};


interface UserRow {
  id: string;
  email: string;
  username: string;
  fullName: string | null;
  createdAt: DbDate;
  updatedAt: DbDate;
}

const USER_COLUMNS = `id, email, username, full_name as "fullName", created_at as "createdAt", updated_at as "updatedAt"`;

const mapUser = (row: UserRow): User => ({
  ...row,
  createdAt: toTimestamp(row.createdAt),
  updatedAt: toTimestamp(row.updatedAt),
});

export const createUser = async (input: { email: string; username: string; fullName?: string | null }): Promise<User> => {
  const p = getPool();
  const existing = await p.query(`SELECT 1 FROM users WHERE email = $1 OR username = $2`, [input.email, input.username]);
  if (existing.rows.length) {
    throw new RecordError('A user with that email or username already exists', 'CONFLICT');
  }
  try {
    const { rows } = await p.query<UserRow>(
      `INSERT INTO users (id, email, username, full_name) VALUES ($1, $2, $3, $4) RETURNING ${USER_COLUMNS}`,
      [randomUUID(), input.email, input.username, input.fullName ?? null]
    );
    return mapUser(rows[0]);
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new RecordError('A user with that email or username already exists', 'CONFLICT');
    }
    throw err;
  }
};

export const getUser = async (userId: string): Promise<User | null> => {
  if (!UUID_PATTERN.test(userId)) return null;
  const { rows } = await getPool().query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [userId]);
  return rows[0] ? mapUser(rows[0]) : null;
};


interface TripRow {
  id: string;
  name: string;
  description: string | null;
  destination: string;
  startDate: DbDate | null;
  endDate: DbDate | null;
  groupSize: number;
  budget: DbNumber | null;
  currency: string;
  status: TripStatus;
  createdById: string;
  createdAt: DbDate;
  updatedAt: DbDate;
}

const TRIP_COLUMNS = `id, name, description, destination, start_date as "startDate", end_date as "endDate",
  group_size as "groupSize", budget, currency, status, created_by_id as "createdById",
  created_at as "createdAt", updated_at as "updatedAt"`;

const mapTrip = (row: TripRow): Trip => ({
  ...row,
  startDate: toDateOnly(row.startDate),
  endDate: toDateOnly(row.endDate),
  groupSize: Number(row.groupSize),
  budget: toNumber(row.budget),
  createdAt: toTimestamp(row.createdAt),
  updatedAt: toTimestamp(row.updatedAt),
});

export interface TripInput {
  name: string;
  destination: string;
  createdById: string;
  description?: string | null;
  startDate?: string | null;
  endDate?: string | null;
  groupSize?: number;
  budget?: number | null;
  currency?: string;
  status?: TripStatus;
}

export type TripPatch = Partial<Omit<TripInput, 'createdById'>>;

const TRIP_PATCH_COLUMNS: Record<keyof TripPatch, string> = {
  name: 'name',
  destination: 'destination',
  description: 'description',
  startDate: 'start_date',
  endDate: 'end_date',
  groupSize: 'group_size',
  budget: 'budget',
  currency: 'currency',
  status: 'status',
};

const isTripPatchKey = (key: string): key is keyof TripPatch => key in TRIP_PATCH_COLUMNS;

export const createTrip = async (input: TripInput): Promise<Trip> => {
  const creator = await getUser(input.createdById);
  if (!creator) throw new RecordError('Creator not found', 'NOT_FOUND');

  return withTransaction(async (client) => {
    const id = randomUUID();
    const { rows } = await client.query<TripRow>(
      `INSERT INTO trips (id, name, description, destination, start_date, end_date, group_size, budget, currency, status, created_by_id)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11) RETURNING ${TRIP_COLUMNS}`,
      [
        id,
        input.name,
        input.description ?? null,
        input.destination,
        input.startDate ?? null,
        input.endDate ?? null,
        input.groupSize ?? 1,
        input.budget ?? null,
        input.currency ?? 'AUD',
        input.status ?? 'planned',
        creator.id,
      ]
    );

    // The creator is always an accepted owner of the trip
    await client.query(
      `INSERT INTO trip_members (id, trip_id, user_id, role, status, joined_at) VALUES ($1, $2, $3, 'owner', 'accepted', NOW())`,
      [randomUUID(), id, creator.id]
    );
    return mapTrip(rows[0]);
  });
};

export const getTrip = async (tripId: string): Promise<Trip | null> => {
  if (!UUID_PATTERN.test(tripId)) return null;
  const { rows } = await getPool().query<TripRow>(`SELECT ${TRIP_COLUMNS} FROM trips WHERE id = $1`, [tripId]);
  return rows[0] ? mapTrip(rows[0]) : null;
};

const requireTrip = async (tripId: string): Promise<Trip> => {
  const trip = await getTrip(tripId);
  if (!trip) throw new RecordError('Trip not found', 'NOT_FOUND');
  return trip;
};

export const listTrips = async (userId?: string): Promise<Trip[]> => {
  const p = getPool();
  if (!userId) {
    const { rows } = await p.query<TripRow>(`SELECT ${TRIP_COLUMNS} FROM trips ORDER BY created_at DESC`);
    return rows.map(mapTrip);
  }
  if (!UUID_PATTERN.test(userId)) return [];
  const { rows } = await p.query<TripRow>(
    `SELECT ${TRIP_COLUMNS} FROM trips t
     WHERE t.created_by_id = $1
        OR t.id IN (SELECT trip_id FROM trip_members WHERE user_id = $1)
     ORDER BY t.created_at DESC`,
    [userId]
  );
  return rows.map(mapTrip);
};

export const updateTrip = async (tripId: string, patch: TripPatch): Promise<Trip> => {
  const trip = await requireTrip(tripId);
  // A patch may move only one end of the range, so check it against the stored dates.
  const startDate = patch.startDate !== undefined ? patch.startDate : trip.startDate;
  const endDate = patch.endDate !== undefined ? patch.endDate : trip.endDate;
  if (startDate && endDate && endDate < startDate) {
    throw new RecordError('endDate must not be before startDate', 'INVALID');
  }
  const sets: string[] = [];
  const values: unknown[] = [];
  for (const [key, value] of Object.entries(patch)) {
    if (!isTripPatchKey(key) || value === undefined) continue;
    values.push(value);
    sets.push(`${TRIP_PATCH_COLUMNS[key]} = $${values.length}`);
  }
  if (!sets.length) throw new RecordError('At least one field is required', 'INVALID');

  values.push(tripId);
  const { rows } = await getPool().query<TripRow>(
    `UPDATE trips SET ${sets.join(', ')}, updated_at = NOW() WHERE id = $${values.length} RETURNING ${TRIP_COLUMNS}`,
    values
  );
  return mapTrip(rows[0]);
};

// Members, activities, expenses and messages go with the trip through ON DELETE CASCADE.
export const deleteTrip = async (tripId: string): Promise<void> => {
  assertId(tripId, 'Trip');
  const { rows } = await getPool().query(`DELETE FROM trips WHERE id = $1 RETURNING id`, [tripId]);
  if (!rows.length) throw new RecordError('Trip not found', 'NOT_FOUND');
};


interface MemberRow {
  id: string;
  tripId: string;
  userId: string;
  role: TripMemberRole;
  status: TripMemberStatus;
  joinedAt: DbDate | null;
  createdAt: DbDate;
  username?: string;
}

const MEMBER_COLUMNS = `tm.id, tm.trip_id as "tripId", tm.user_id as "userId", tm.role, tm.status,
  tm.joined_at as "joinedAt", tm.created_at as "createdAt"`;

const mapMember = (row: MemberRow): TripMember => ({
  ...row,
  joinedAt: row.joinedAt == null ? null : toTimestamp(row.joinedAt),
  createdAt: toTimestamp(row.createdAt),
});

export const listTripMembers = async (tripId: string): Promise<TripMember[]> => {
  await requireTrip(tripId);
  const { rows } = await getPool().query<MemberRow>(
    `SELECT ${MEMBER_COLUMNS}, u.username
     FROM trip_members tm
     JOIN users u ON u.id = tm.user_id
     WHERE tm.trip_id = $1
     ORDER BY tm.created_at ASC`,
    [tripId]
  );
  return rows.map(mapMember);
};

const findMembership = async (tripId: string, userId: string): Promise<TripMember | null> => {
  if (!UUID_PATTERN.test(userId)) return null;
  const { rows } = await getPool().query<MemberRow>(
    `SELECT ${MEMBER_COLUMNS} FROM trip_members tm WHERE tm.trip_id = $1 AND tm.user_id = $2`,
    [tripId, userId]
  );
  return rows[0] ? mapMember(rows[0]) : null;
};

// Invited and accepted members may act on a trip; declined ones may not.
const requireActiveMember = async (tripId: string, userId: string, label: string): Promise<TripMember> => {
  const member = await findMembership(tripId, userId);
  if (!member || member.status === 'declined') {
    throw new RecordError(`${label} is not a member of this trip`, 'INVALID');
  }
  return member;
};

export const addTripMember = async (
  tripId: string,
  input: { userId: string; role?: TripMemberRole; status?: TripMemberStatus }
): Promise<TripMember> => {
  await requireTrip(tripId);
  const user = await getUser(input.userId);
  if (!user) throw new RecordError('User not found', 'NOT_FOUND');
  if (await findMembership(tripId, user.id)) {
    throw new RecordError('User is already a member of this trip', 'CONFLICT');
  }
  const status = input.status ?? 'invited';
  const joinedAt = status === 'accepted' ? 'NOW()' : 'NULL';
  try {
    const { rows } = await getPool().query<MemberRow>(
      `INSERT INTO trip_members (id, trip_id, user_id, role, status, joined_at) VALUES ($1, $2, $3, $4, $5, ${joinedAt})
       RETURNING id, trip_id as "tripId", user_id as "userId", role, status, joined_at as "joinedAt", created_at as "createdAt"`,
      [randomUUID(), tripId, user.id, input.role ?? 'member', status]
    );
    return mapMember({ ...rows[0], username: user.username });
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new RecordError('User is already a member of this trip', 'CONFLICT');
    }
    throw err;
  }
};

const requireMemberRecord = async (tripId: string, memberId: string): Promise<TripMember> => {
  assertId(memberId, 'Member');
  const { rows } = await getPool().query<MemberRow>(
    `SELECT ${MEMBER_COLUMNS} FROM trip_members tm WHERE tm.trip_id = $1 AND tm.id = $2`,
    [tripId, memberId]
  );
  if (!rows.length) throw new RecordError('Member not found', 'NOT_FOUND');
  return mapMember(rows[0]);
};

export const updateTripMember = async (
  tripId: string,
  memberId: string,
  patch: { role?: TripMemberRole; status?: TripMemberStatus }
): Promise<TripMember> => {
  await requireTrip(tripId);
  const member = await requireMemberRecord(tripId, memberId);
  if (!patch.role && !patch.status) throw new RecordError('role or status is required', 'INVALID');
  if (member.role === 'owner' && patch.role && patch.role !== 'owner') {
    throw new RecordError('The trip owner cannot be demoted', 'INVALID');
  }
  if (member.role === 'owner' && patch.status && patch.status !== 'accepted') {
    throw new RecordError('The trip owner must stay accepted', 'INVALID');
  }

  const role = patch.role ?? member.role;
  const status = patch.status ?? member.status;
  // joined_at is stamped the first time a member accepts and kept afterwards
  const stampJoin = status === 'accepted' && !member.joinedAt ? ', joined_at = NOW()' : '';
  const { rows } = await getPool().query<MemberRow>(
    `UPDATE trip_members SET role = $1, status = $2${stampJoin} WHERE id = $3
     RETURNING id, trip_id as "tripId", user_id as "userId", role, status, joined_at as "joinedAt", created_at as "createdAt"`,
    [role, status, member.id]
  );
  return mapMember(rows[0]);
};

export const removeTripMember = async (tripId: string, memberId: string): Promise<void> => {
  await requireTrip(tripId);
  const member = await requireMemberRecord(tripId, memberId);
  if (member.role === 'owner') throw new RecordError('The trip owner cannot be removed', 'INVALID');
  await getPool().query(`DELETE FROM trip_members WHERE id = $1`, [member.id]);
};


interface ActivityRow {
  id: string;
  tripId: string;
  name: string;
  category: ActivityCategory;
  status: ActivityStatus;
  address: string | null;
  rating: DbNumber | null;
  url: string | null;
  price: string | null;
  scheduledDate: DbDate | null;
  createdById: string | null;
  createdAt: DbDate;
  updatedAt: DbDate;
}

const ACTIVITY_COLUMNS = `id, trip_id as "tripId", name, category, status, address, rating, url, price,
  scheduled_date as "scheduledDate", created_by_id as "createdById", created_at as "createdAt", updated_at as "updatedAt"`;

const mapActivity = (row: ActivityRow): TripActivity => ({
  ...row,
  rating: toNumber(row.rating),
  scheduledDate: toDateOnly(row.scheduledDate),
  createdAt: toTimestamp(row.createdAt),
  updatedAt: toTimestamp(row.updatedAt),
});

export interface ActivityInput {
  name: string;
  category?: ActivityCategory;
  status?: ActivityStatus;
  address?: string | null;
  rating?: number | null;
  url?: string | null;
  price?: string | null;
  scheduledDate?: string | null;
  createdById?: string | null;
}

export const listActivities = async (tripId: string): Promise<TripActivity[]> => {
  await requireTrip(tripId);
  const { rows } = await getPool().query<ActivityRow>(
    `SELECT ${ACTIVITY_COLUMNS} FROM activities WHERE trip_id = $1 ORDER BY created_at ASC`,
    [tripId]
  );
  return rows.map(mapActivity);
};

export const addActivity = async (tripId: string, input: ActivityInput): Promise<TripActivity> => {
  await requireTrip(tripId);
  if (input.createdById) await requireActiveMember(tripId, input.createdById, 'Creator');
  const { rows } = await getPool().query<ActivityRow>(
    `INSERT INTO activities (id, trip_id, name, category, status, address, rating, url, price, scheduled_date, created_by_id)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11) RETURNING ${ACTIVITY_COLUMNS}`,
    [
      randomUUID(),
      tripId,
      input.name,
      input.category ?? 'other',
      input.status ?? 'planned',
      input.address ?? null,
      input.rating ?? null,
      input.url ?? null,
      input.price ?? null,
      input.scheduledDate ?? null,
      input.createdById ?? null,
    ]
  );
  return mapActivity(rows[0]);
};

export const updateActivityStatus = async (
  tripId: string,
  activityId: string,
  status: ActivityStatus
): Promise<TripActivity> => {
  await requireTrip(tripId);
  assertId(activityId, 'Activity');
  const { rows } = await getPool().query<ActivityRow>(
    `UPDATE activities SET status = $1, updated_at = NOW() WHERE id = $2 AND trip_id = $3 RETURNING ${ACTIVITY_COLUMNS}`,
    [status, activityId, tripId]
  );
  if (!rows.length) throw new RecordError('Activity not found', 'NOT_FOUND');
  return mapActivity(rows[0]);
};

export const deleteActivity = async (tripId: string, activityId: string): Promise<void> => {
  await requireTrip(tripId);
  assertId(activityId, 'Activity');
  const { rows } = await getPool().query(`DELETE FROM activities WHERE id = $1 AND trip_id = $2 RETURNING id`, [
    activityId,
    tripId,
  ]);
  if (!rows.length) throw new RecordError('Activity not found', 'NOT_FOUND');
};


interface ExpenseRow {
  id: string;
  tripId: string;
  paidById: string;
  description: string;
  amount: DbNumber;
  currency: string;
  category: ExpenseCategory;
  paymentMethod: PaymentMethod;
  expenseDate: DbDate | null;
  createdAt: DbDate;
  updatedAt: DbDate;
}

interface SplitRow {
  id: string;
  expenseId: string;
  userId: string;
  amount: DbNumber;
}

const EXPENSE_COLUMNS = `id, trip_id as "tripId", paid_by_id as "paidById", description, amount, currency, category,
  payment_method as "paymentMethod", expense_date as "expenseDate", created_at as "createdAt", updated_at as "updatedAt"`;

const mapSplit = (row: SplitRow): ExpenseSplit => ({ ...row, amount: Number(row.amount) });

const mapExpense = (row: ExpenseRow, splits: ExpenseSplit[]): Expense => ({
  ...row,
  amount: Number(row.amount),
  expenseDate: toDateOnly(row.expenseDate),
  createdAt: toTimestamp(row.createdAt),
  updatedAt: toTimestamp(row.updatedAt),
  splits,
});

export interface SplitInput {
  userId: string;
  amount: number;
}

export interface ExpenseInput {
  paidById: string;
  description: string;
  amount: number;
  currency?: string;
  category?: ExpenseCategory;
  paymentMethod?: PaymentMethod;
  expenseDate?: string | null;
  splits?: SplitInput[];
}

/**
 * Divides an amount into equal shares in whole cents. Leftover cents go to the
 * first users so the shares always add up to the amount.
 */
export const splitEvenly = (amount: number, userIds: string[]): SplitInput[] => {
  if (!userIds.length) return [];
  const cents = toCents(amount);
  const base = Math.floor(cents / userIds.length);
  const remainder = cents - base * userIds.length;
  return userIds.map((userId, index) => ({ userId, amount: (base + (index < remainder ? 1 : 0)) / 100 }));
};

const resolveSplits = async (tripId: string, input: ExpenseInput): Promise<SplitInput[]> => {
  if (!input.splits || !input.splits.length) {
    const members = await listTripMembers(tripId);
    const accepted = members.filter((m) => m.status === 'accepted').map((m) => m.userId);
    return splitEvenly(input.amount, accepted.length ? accepted : [input.paidById]);
  }

  const userIds = new Set<string>();
  let totalCents = 0;
  for (const split of input.splits) {
    if (userIds.has(split.userId)) throw new RecordError('Each user may appear only once in splits', 'INVALID');
    userIds.add(split.userId);
    await requireActiveMember(tripId, split.userId, 'Split user');
    totalCents += toCents(split.amount);
  }
  if (totalCents !== toCents(input.amount)) {
    throw new RecordError('Split amounts must add up to the expense amount', 'INVALID');
  }
  return input.splits;
};

export const listExpenses = async (tripId: string): Promise<Expense[]> => {
  await requireTrip(tripId);
  const p = getPool();
  const { rows } = await p.query<ExpenseRow>(
    `SELECT ${EXPENSE_COLUMNS} FROM expenses WHERE trip_id = $1 ORDER BY created_at ASC`,
    [tripId]
  );
  const { rows: splitRows } = await p.query<SplitRow>(
    `SELECT s.id, s.expense_id as "expenseId", s.user_id as "userId", s.amount
     FROM expense_splits s
     JOIN expenses e ON e.id = s.expense_id
     WHERE e.trip_id = $1`,
    [tripId]
  );
  const splitsByExpense = new Map<string, ExpenseSplit[]>();
  for (const row of splitRows) {
    const list = splitsByExpense.get(row.expenseId) ?? [];
    list.push(mapSplit(row));
    splitsByExpense.set(row.expenseId, list);
  }
  return rows.map((row) => mapExpense(row, splitsByExpense.get(row.id) ?? []));
};

export const createExpense = async (tripId: string, input: ExpenseInput): Promise<Expense> => {
  const trip = await requireTrip(tripId);
  const amounts = [input.amount, ...(input.splits ?? []).map((split) => split.amount)];
  if (!amounts.every(isWholeCents)) {
    throw new RecordError('Amounts must be in whole cents', 'INVALID');
  }
  await requireActiveMember(tripId, input.paidById, 'Payer');
  const splits = await resolveSplits(tripId, input);

  return withTransaction(async (client) => {
    const expenseId = randomUUID();
    const { rows } = await client.query<ExpenseRow>(
      `INSERT INTO expenses (id, trip_id, paid_by_id, description, amount, currency, category, payment_method, expense_date)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9) RETURNING ${EXPENSE_COLUMNS}`,
      [
        expenseId,
        tripId,
        input.paidById,
        input.description,
        input.amount,
        input.currency ?? trip.currency,
        input.category ?? 'other',
        input.paymentMethod ?? 'other',
        input.expenseDate ?? null,
      ]
    );

    const saved: ExpenseSplit[] = [];
    for (const split of splits) {
      const { rows: splitRows } = await client.query<SplitRow>(
        `INSERT INTO expense_splits (id, expense_id, user_id, amount) VALUES ($1, $2, $3, $4)
         RETURNING id, expense_id as "expenseId", user_id as "userId", amount`,
        [randomUUID(), expenseId, split.userId, split.amount]
      );
      saved.push(mapSplit(splitRows[0]));
    }
    return mapExpense(rows[0], saved);
  });
};

export const deleteExpense = async (tripId: string, expenseId: string): Promise<void> => {
  await requireTrip(tripId);
  assertId(expenseId, 'Expense');
  const { rows } = await getPool().query(`DELETE FROM expenses WHERE id = $1 AND trip_id = $2 RETURNING id`, [
    expenseId,
    tripId,
  ]);
  if (!rows.length) throw new RecordError('Expense not found', 'NOT_FOUND');
};


interface MessageRow {
  id: string;
  tripId: string;
  senderId: string;
  content: string;
  messageType: MessageType;
  createdAt: DbDate;
  updatedAt: DbDate;
}

interface ReadRow {
  id: string;
  messageId: string;
  userId: string;
  readAt: DbDate;
}

const MESSAGE_COLUMNS = `id, trip_id as "tripId", sender_id as "senderId", content, message_type as "messageType",
  created_at as "createdAt", updated_at as "updatedAt"`;

const mapMessage = (row: MessageRow, readBy: string[]): Message => ({
  ...row,
  createdAt: toTimestamp(row.createdAt),
  updatedAt: toTimestamp(row.updatedAt),
  readBy,
});

export const listMessages = async (tripId: string): Promise<Message[]> => {
  await requireTrip(tripId);
  const p = getPool();
  const { rows } = await p.query<MessageRow>(
    `SELECT ${MESSAGE_COLUMNS} FROM messages WHERE trip_id = $1 ORDER BY created_at ASC`,
    [tripId]
  );
  const { rows: reads } = await p.query<{ messageId: string; userId: string }>(
    `SELECT r.message_id as "messageId", r.user_id as "userId"
     FROM message_reads r
     JOIN messages m ON m.id = r.message_id
     WHERE m.trip_id = $1`,
    [tripId]
  );
  const readers = new Map<string, string[]>();
  for (const read of reads) {
    readers.set(read.messageId, [...(readers.get(read.messageId) ?? []), read.userId]);
  }
  return rows.map((row) => mapMessage(row, readers.get(row.id) ?? []));
};

export const createMessage = async (
  tripId: string,
  input: { senderId: string; content: string; messageType?: MessageType }
): Promise<Message> => {
  await requireTrip(tripId);
  await requireActiveMember(tripId, input.senderId, 'Sender');
  const { rows } = await getPool().query<MessageRow>(
    `INSERT INTO messages (id, trip_id, sender_id, content, message_type) VALUES ($1, $2, $3, $4, $5) RETURNING ${MESSAGE_COLUMNS}`,
    [randomUUID(), tripId, input.senderId, input.content, input.messageType ?? 'text']
  );
  return mapMessage(rows[0], []);
};

// Marking the same message twice returns the first receipt.
export const markMessageRead = async (tripId: string, messageId: string, userId: string): Promise<MessageRead> => {
  await requireTrip(tripId);
  assertId(messageId, 'Message');
  const p = getPool();
  const message = await p.query(`SELECT 1 FROM messages WHERE id = $1 AND trip_id = $2`, [messageId, tripId]);
  if (!message.rows.length) throw new RecordError('Message not found', 'NOT_FOUND');
  await requireActiveMember(tripId, userId, 'Reader');

  await p.query(
    `INSERT INTO message_reads (id, message_id, user_id) VALUES ($1, $2, $3)
     ON CONFLICT (message_id, user_id) DO NOTHING`,
    [randomUUID(), messageId, userId]
  );
  const { rows } = await p.query<ReadRow>(
    `SELECT id, message_id as "messageId", user_id as "userId", read_at as "readAt"
     FROM message_reads WHERE message_id = $1 AND user_id = $2`,
    [messageId, userId]
  );
  return { ...rows[0], readAt: toTimestamp(rows[0].readAt) };
};
