import { CreateExpenseInput, Expense, UpdateExpenseInput, ValidationResult } from './types';

const MAX_CATEGORY_LENGTH = 50;
const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
const INTEGER_REGEX = /^-?\d+$/;
// Plain decimals only: no hex, binary, exponents or padding
const DECIMAL_REGEX = /^-?(\d+(\.\d*)?|\.\d+)$/;

export type Field<T> = { value: T } | { error: string };

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

function fieldErrors(...fields: Field<unknown>[]): string[] {
  return fields.flatMap(field => ('error' in field ? [field.error] : []));
}

// Rejects strings like 2024-02-30 that Date would roll over into March
export function isValidDate(value: string): boolean {
  if (!DATE_REGEX.test(value)) return false;

  const [year, month, day] = value.split('-').map(Number);
  const parsed = new Date(Date.UTC(year, month - 1, day));
  return (
    parsed.getUTCFullYear() === year &&
    parsed.getUTCMonth() === month - 1 &&
    parsed.getUTCDate() === day
  );
}

function parseAmount(value: unknown): Field<number> {
  if (value === undefined || value === null) {
    return { error: 'Amount is required' };
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return { error: 'Amount must be a valid number' };
  }
  if (value <= 0) {
    return { error: 'Amount must be greater than 0' };
  }
  return { value };
}

function parseCategory(value: unknown): Field<string> {
  if (value === undefined || value === null) {
    return { error: 'Category is required' };
  }
  if (typeof value !== 'string') {
    return { error: 'Category must be a string' };
  }

  const category = value.trim();
  if (category.length === 0) {
    return { error: 'Category cannot be empty' };
  }
  // Count code points, not UTF-16 units
  if (Array.from(category).length > MAX_CATEGORY_LENGTH) {
    return { error: `Category must be ${MAX_CATEGORY_LENGTH} characters or less` };
  }
  return { value: category };
}

function parseDate(value: unknown, label = 'Date'): Field<string> {
  if (value === undefined || value === null) {
    return { error: `${label} is required` };
  }
  if (typeof value !== 'string') {
    return { error: `${label} must be a string` };
  }

  const date = value.trim();
  if (!DATE_REGEX.test(date)) {
    return { error: `${label} must be in YYYY-MM-DD format` };
  }
  if (!isValidDate(date)) {
    return { error: `${label} is not a valid date` };
  }
  return { value: date };
}

export function validateExpenseInput(input: unknown): ValidationResult<CreateExpenseInput> {
  if (!isRecord(input)) {
    return { valid: false, errors: ['Request body must be a valid JSON object'] };
  }

  const amount = parseAmount(input.amount);
  const category = parseCategory(input.category);
  const date = parseDate(input.date);

  if ('error' in amount || 'error' in category || 'error' in date) {
    return { valid: false, errors: fieldErrors(amount, category, date) };
  }

  return {
    valid: true,
    errors: [],
    value: { category: category.value, amount: amount.value, date: date.value }
  };
}

// Only the fields present in the body are checked; `id` and unknown keys are ignored
export function validateExpenseUpdate(input: unknown): ValidationResult<UpdateExpenseInput> {
  if (!isRecord(input)) {
    return { valid: false, errors: ['Request body must be a valid JSON object'] };
  }

  const value: UpdateExpenseInput = {};
  const errors: string[] = [];

  if (input.amount !== undefined) {
    const amount = parseAmount(input.amount);
    if ('error' in amount) errors.push(amount.error);
    else value.amount = amount.value;
  }

  if (input.category !== undefined) {
    const category = parseCategory(input.category);
    if ('error' in category) errors.push(category.error);
    else value.category = category.value;
  }

  if (input.date !== undefined) {
    const date = parseDate(input.date);
    if ('error' in date) errors.push(date.error);
    else value.date = date.value;
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }
  return { valid: true, errors: [], value };
}

export function mergeExpense(existing: Expense, patch: UpdateExpenseInput): Expense {
  return { ...existing, ...patch, id: existing.id };
}

export function parseExpenseId(value: unknown): Field<number> {
  const raw = typeof value === 'number' ? String(value) : value;
  if (raw === undefined || raw === null || raw === '') {
    return { error: 'Expense id is required' };
  }
  // Any well-formed integer goes on to the lookup; unknown ids are not found there
  if (typeof raw !== 'string' || !INTEGER_REGEX.test(raw.trim())) {
    return { error: 'Expense id must be an integer' };
  }

  const id = Number(raw.trim());
  // Zero is falsy and has always been refused as a missing id
  if (id === 0) {
    return { error: 'Expense id is required' };
  }
  if (!Number.isSafeInteger(id)) {
    return { error: 'Expense id must be an integer' };
  }
  return { value: id };
}

export function parseMinAmount(value: unknown): Field<number> {
  if (value === undefined || value === '') {
    return { value: 0 };
  }

  let amount = NaN;
  if (typeof value === 'number') amount = value;
  else if (typeof value === 'string' && DECIMAL_REGEX.test(value)) amount = Number(value);

  if (!Number.isFinite(amount)) {
    return { error: 'Minimum amount must be a valid number' };
  }
  return { value: amount };
}

export function parseDateParam(value: unknown, label: string): Field<string | undefined> {
  if (value === undefined || value === '') {
    return { value: undefined };
  }
  return parseDate(value, label);
}

// Local calendar date of `now`, as the date filter's default upper bound
export function today(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}
