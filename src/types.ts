// Expense types
export interface Expense {
  id: number; // Assigned by the store, never changes
  category: string;
  amount: number;
  date: string; // ISO date string (YYYY-MM-DD)
}

export type NewExpense = Omit<Expense, 'id'>;

export interface CreateExpenseInput {
  category: string;
  amount: number;
  date: string;
}

export type UpdateExpenseInput = Partial<CreateExpenseInput>;

export interface DateRange {
  start?: string;
  end: string;
}

export interface CategoryTotal {
  category: string;
  total: number;
}

export interface DeletedExpense {
  message: string;
  expense: Expense;
}

export interface ApiError {
  error: string;
  details?: string[];
}

export type ValidationResult<T> =
  | { valid: true; errors: []; value: T }
  | { valid: false; errors: string[] };

// Failures a service operation can report to the HTTP layer
export type ServiceError =
  | { kind: 'validation'; message: string; details: string[] }
  | { kind: 'not_found'; message: string }
  | { kind: 'storage'; message: string };

export interface ServiceSuccess<T> {
  ok: true;
  value: T;
}

export interface ServiceFailure {
  ok: false;
  error: ServiceError;
}

export type ServiceResult<T> = ServiceSuccess<T> | ServiceFailure;
