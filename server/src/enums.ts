// Allowed values for the enum-constrained text columns. The arrays double as
// request validators and as the CHECK lists in the DDL.

export const TRIP_STATUSES = ['planned', 'ongoing', 'completed', 'cancelled'] as const;
export type TripStatus = (typeof TRIP_STATUSES)[number];

export const TRIP_MEMBER_ROLES = ['owner', 'admin', 'member'] as const;
export type TripMemberRole = (typeof TRIP_MEMBER_ROLES)[number];

export const TRIP_MEMBER_STATUSES = ['invited', 'accepted', 'declined'] as const;
export type TripMemberStatus = (typeof TRIP_MEMBER_STATUSES)[number];

export const ACTIVITY_CATEGORIES = [
  'sightseeing',
  'restaurant',
  'hotel',
  'transport',
  'shopping',
  'entertainment',
  'outdoor',
  'culture',
  'nightlife',
  'beach',
  'mountain',
  'museum',
  'park',
  'theater',
  'sports',
  'spa',
  'other',
] as const;
export type ActivityCategory = (typeof ACTIVITY_CATEGORIES)[number];

export const ACTIVITY_STATUSES = ['planned', 'confirmed', 'completed', 'cancelled'] as const;
export type ActivityStatus = (typeof ACTIVITY_STATUSES)[number];

export const EXPENSE_CATEGORIES = [
  'food',
  'transport',
  'accommodation',
  'shopping',
  'entertainment',
  'activities',
  'drinks',
  'tips',
  'taxes',
  'insurance',
  'visa',
  'healthcare',
  'emergency',
  'other',
] as const;
export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];

export const PAYMENT_METHODS = [
  'cash',
  'card',
  'credit_card',
  'debit_card',
  'paypal',
  'venmo',
  'bank_transfer',
  'other',
] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const MESSAGE_TYPES = ['text', 'image', 'file', 'location', 'system'] as const;
export type MessageType = (typeof MESSAGE_TYPES)[number];

export const isOneOf = <T extends string>(values: readonly T[], value: unknown): value is T =>
  typeof value === 'string' && values.some((v) => v === value);

export const checkList = (values: readonly string[]): string => values.map((v) => `'${v}'`).join(', ');
