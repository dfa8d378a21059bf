import {
  ActivityCategory,
  ActivityStatus,
  ExpenseCategory,
  MessageType,
  PaymentMethod,
  TripMemberRole,
  TripMemberStatus,
  TripStatus,
} from './enums';

export interface User {
  id: string;
  email: string;
  username: string;
  fullName: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface Trip {
  id: string;
  name: string;
  description: string | null;
  destination: string;
  startDate: string | null;
  endDate: string | null;
  groupSize: number;
  budget: number | null;
  currency: string;
  status: TripStatus;
  createdById: string;
  createdAt: string;
  updatedAt: string;
}

export interface TripMember {
  id: string;
  tripId: string;
  userId: string;
  role: TripMemberRole;
  status: TripMemberStatus;
  joinedAt: string | null;
  createdAt: string;
  username?: string;
}

export interface TripActivity {
  id: string;
  tripId: string;
  name: string;
  category: ActivityCategory;
  status: ActivityStatus;
  address: string | null;
  rating: number | null;
  url: string | null;
  price: string | null;
  scheduledDate: string | null;
  createdById: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface ExpenseSplit {
  id: string;
  expenseId: string;
  userId: string;
  amount: number;
}

export interface Expense {
  id: string;
  tripId: string;
  paidById: string;
  description: string;
  amount: number;
  currency: string;
  category: ExpenseCategory;
  paymentMethod: PaymentMethod;
  expenseDate: string | null;
  createdAt: string;
  updatedAt: string;
  splits: ExpenseSplit[];
}

export interface Message {
  id: string;
  tripId: string;
  senderId: string;
  content: string;
  messageType: MessageType;
  createdAt: string;
  updatedAt: string;
  readBy: string[];
}

export interface MessageRead {
  id: string;
  messageId: string;
  userId: string;
  readAt: string;
}

// Suggestion records keep the snake_case keys the planner clients read.
export interface ActivitySuggestion {
  name: string;
  category?: string | null;
  rating?: number | null;
  address?: string | null;
  phone?: string | null;
  url?: string | null;
  image_url?: string | null;
  price?: string | null;
}

export interface TripPlanResponse {
  city: string;
  duration_days: number | null;
  activities: ActivitySuggestion[];
}
