import { ExpenseStore } from './database';
import { DateRange, Expense, NewExpense } from './types';

function sameCategory(a: string, b: string): boolean {
  // Same rule as the Mongo collation: accents count, case does not
  return a.localeCompare(b, 'en', { sensitivity: 'accent' }) === 0;
}

// Keeps expenses in process memory. Nothing survives a restart.
export class MemoryExpenseStore implements ExpenseStore {
  private readonly rows = new Map<number, Expense>();
  private seq = 0;

  async init(): Promise<void> {}

  async insert(expense: NewExpense): Promise<Expense> {
    const record: Expense = { id: ++this.seq, ...expense };
    this.rows.set(record.id, record);
    return { ...record };
  }

  async getAll(): Promise<Expense[]> {
    return this.sorted(() => true);
  }

  async getById(id: number): Promise<Expense | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async findByCategory(category: string): Promise<Expense[]> {
    return this.sorted(row => sameCategory(row.category, category));
  }

  async findByDateRange(range: DateRange): Promise<Expense[]> {
    return this.sorted(
      row => (!range.start || range.start <= row.date) && row.date <= range.end
    );
  }

  async update(id: number, updates: Partial<NewExpense>): Promise<Expense | null> {
    const row = this.rows.get(id);
    if (!row) return null;

    const updated: Expense = { ...row, ...updates, id };
    this.rows.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<Expense | null> {
    const row = this.rows.get(id);
    if (!row) return null;

    this.rows.delete(id);
    return { ...row };
  }

  async close(): Promise<void> {
    this.rows.clear();
  }

  private sorted(match: (row: Expense) => boolean): Expense[] {
    return Array.from(this.rows.values())
      .filter(match)
      .sort((a, b) => a.id - b.id)
      .map(row => ({ ...row }));
  }
}
