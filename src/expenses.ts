import { ExpenseStore } from './database';
import {
  CategoryTotal,
  DeletedExpense,
  Expense,
  ServiceError,
  ServiceFailure,
  ServiceResult,
  ServiceSuccess
} from './types';
import {
  mergeExpense,
  parseDateParam,
  parseExpenseId,
  parseMinAmount,
  today,
  validateExpenseInput,
  validateExpenseUpdate
} from './validation';

const NO_EXPENSES = 'No expenses found';
const EXPENSE_NOT_FOUND = 'Expense not found';

function ok<T>(value: T): ServiceSuccess<T> {
  return { ok: true, value };
}

function fail(error: ServiceError): ServiceFailure {
  return { ok: false, error };
}

function invalid(message: string, details: string[] = []): ServiceFailure {
  return fail({ kind: 'validation', message, details });
}

function notFound(message: string): ServiceFailure {
  return fail({ kind: 'not_found', message });
}

function requiredText(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const text = value.trim();
  return text.length > 0 ? text : null;
}

export class ExpenseService {
  constructor(
    private readonly store: ExpenseStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  // Store exceptions end here as storage errors; nothing is retried
  private async guard<T>(
    action: string,
    work: () => Promise<ServiceResult<T>>
  ): Promise<ServiceResult<T>> {
    try {
      return await work();
    } catch (error) {
      console.error(`Error ${action}:`, error);
      const message = error instanceof Error ? error.message : String(error);
      return fail({ kind: 'storage', message });
    }
  }

  async create(body: unknown): Promise<ServiceResult<Expense>> {
    const validation = validateExpenseInput(body);
    if (!validation.valid) {
      return invalid('Validation failed', validation.errors);
    }

    const input = validation.value;
    return this.guard('creating expense', async () => {
      const expense = await this.store.insert(input);
      console.log(`Created expense: ${expense.id}`);
      return ok(expense);
    });
  }

  async listAll(): Promise<ServiceResult<Expense[]>> {
    return this.guard<Expense[]>('fetching expenses', async () => {
      const expenses = await this.store.getAll();
      return expenses.length > 0 ? ok(expenses) : notFound(NO_EXPENSES);
    });
  }

  async listByCategory(category: unknown): Promise<ServiceResult<Expense[]>> {
    const wanted = requiredText(category);
    if (wanted === null) {
      return invalid('Category is required');
    }
    return this.matchCategory(wanted);
  }

  // Exact category match, same as listByCategory; not a substring search
  async search(query: unknown): Promise<ServiceResult<Expense[]>> {
    const wanted = requiredText(query);
    if (wanted === null) {
      return invalid('Query parameter is required');
    }
    return this.matchCategory(wanted);
  }

  private async matchCategory(category: string): Promise<ServiceResult<Expense[]>> {
    return this.guard<Expense[]>('fetching expenses by category', async () => {
      const expenses = await this.store.findByCategory(category);
      return expenses.length > 0 ? ok(expenses) : notFound(NO_EXPENSES);
    });
  }

  /**
   * Totals per category, largest first, keeping only totals strictly above
   * `minAmount`. Sums follow store order (ascending id) so rounding is
   * reproducible; equal totals keep the order their category first appeared.
   */
  async summarize(minAmount: unknown = 0): Promise<ServiceResult<CategoryTotal[]>> {
    const threshold = parseMinAmount(minAmount);
    if ('error' in threshold) {
      return invalid(threshold.error);
    }

    const min = threshold.value;
    return this.guard<CategoryTotal[]>('summarizing expenses', async () => {
      const expenses = await this.store.getAll();
      if (expenses.length === 0) {
        return notFound(NO_EXPENSES);
      }

      const totals = new Map<string, number>();
      for (const expense of expenses) {
        totals.set(expense.category, (totals.get(expense.category) ?? 0) + expense.amount);
      }

      const summary = Array.from(totals, ([category, total]) => ({ category, total }))
        .filter(entry => entry.total > min)
        .sort((a, b) => b.total - a.total);
      return ok(summary);
    });
  }

  async get(id: unknown): Promise<ServiceResult<Expense>> {
    const parsed = parseExpenseId(id);
    if ('error' in parsed) {
      return invalid(parsed.error);
    }

    const expenseId = parsed.value;
    return this.guard<Expense>('fetching expense', async () => {
      const expense = await this.store.getById(expenseId);
      return expense ? ok(expense) : notFound(EXPENSE_NOT_FOUND);
    });
  }

  async delete(id: unknown): Promise<ServiceResult<DeletedExpense>> {
    const parsed = parseExpenseId(id);
    if ('error' in parsed) {
      return invalid(parsed.error);
    }

    const expenseId = parsed.value;
    return this.guard<DeletedExpense>('deleting expense', async () => {
      const expense = await this.store.delete(expenseId);
      if (!expense) {
        return notFound(EXPENSE_NOT_FOUND);
      }

      console.log(`Deleted expense: ${expenseId}`);
      return ok({ message: `Deleted expense ${expenseId}`, expense });
    });
  }

  // Applies only the fields present in `body`; the merged record must stay valid
  async update(id: unknown, body: unknown): Promise<ServiceResult<Expense>> {
    const parsed = parseExpenseId(id);
    if ('error' in parsed) {
      return invalid(parsed.error);
    }

    const validation = validateExpenseUpdate(body);
    if (!validation.valid) {
      return invalid('Validation failed', validation.errors);
    }

    const expenseId = parsed.value;
    const patch = validation.value;
    return this.guard<Expense>('updating expense', async () => {
      const existing = await this.store.getById(expenseId);
      if (!existing) {
        return notFound(EXPENSE_NOT_FOUND);
      }

      const merged = validateExpenseInput(mergeExpense(existing, patch));
      if (!merged.valid) {
        return invalid('Validation failed', merged.errors);
      }
      if (Object.keys(patch).length === 0) {
        return ok(existing);
      }

      const updated = await this.store.update(expenseId, patch);
      if (!updated) {
        return notFound(EXPENSE_NOT_FOUND);
      }

      console.log(`Updated expense: ${expenseId}`);
      return ok(updated);
    });
  }

  // An empty match is a normal result here, unlike the other list operations
  async filterByDate(startDate?: unknown, endDate?: unknown): Promise<ServiceResult<Expense[]>> {
    const start = parseDateParam(startDate, 'start_date');
    const end = parseDateParam(endDate, 'end_date');
    if ('error' in start || 'error' in end) {
      const errors = [start, end].flatMap(field => ('error' in field ? [field.error] : []));
      return invalid('Invalid date range', errors);
    }

    const range = { start: start.value, end: end.value ?? today(this.clock()) };
    return this.guard('filtering expenses by date', async () => {
      return ok(await this.store.findByDateRange(range));
    });
  }
}
