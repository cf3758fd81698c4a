import { ClientSession, Collection, CollationOptions, Db, MongoClient } from 'mongodb';
import { DateRange, Expense, NewExpense } from './types';

// Storage gateway used by the service. Implementations throw on I/O failure.
export interface ExpenseStore {
  init(): Promise<void>;
  insert(expense: NewExpense): Promise<Expense>;
  getAll(): Promise<Expense[]>;
  getById(id: number): Promise<Expense | null>;
  findByCategory(category: string): Promise<Expense[]>;
  findByDateRange(range: DateRange): Promise<Expense[]>;
  update(id: number, updates: Partial<NewExpense>): Promise<Expense | null>;
  delete(id: number): Promise<Expense | null>;
  close(): Promise<void>;
}

interface Counter {
  _id: string;
  seq: number;
}

export interface MongoStoreOptions {
  dbName: string;
  transactions?: boolean;
}

// Exact match, ignoring case
const CASE_INSENSITIVE: CollationOptions = { locale: 'en', strength: 2 };

function toExpense(doc: Expense): Expense {
  return { id: doc.id, category: doc.category, amount: doc.amount, date: doc.date };
}

export class MongoExpenseStore implements ExpenseStore {
  private db: Db | null = null;
  private connecting: Promise<Db> | null = null;

  constructor(
    private readonly client: MongoClient,
    private readonly options: MongoStoreOptions
  ) {}

  private connect(): Promise<Db> {
    if (this.db) return Promise.resolve(this.db);

    if (!this.connecting) {
      this.connecting = (async () => {
        try {
          await this.client.connect();
        } catch (error) {
          // Let a later call retry
          this.connecting = null;
          throw error;
        }
        this.db = this.client.db(this.options.dbName);
        return this.db;
      })();
    }

    return this.connecting;
  }

  private expenses(db: Db): Collection<Expense> {
    return db.collection<Expense>('expenses');
  }

  private counters(db: Db): Collection<Counter> {
    return db.collection<Counter>('counters');
  }

  // One session per operation, always ended; wrapped in a transaction when enabled
  private async scoped<T>(work: (db: Db, session: ClientSession) => Promise<T>): Promise<T> {
    const db = await this.connect();
    const session = this.client.startSession();

    try {
      if (!this.options.transactions) {
        return await work(db, session);
      }

      const results: T[] = [];
      await session.withTransaction(async () => {
        results.length = 0;
        results.push(await work(db, session));
      });
      if (results.length === 0) {
        throw new Error('Transaction finished without a result');
      }
      return results[0];
    } finally {
      await session.endSession();
    }
  }

  async init(): Promise<void> {
    const db = await this.connect();
    const expenses = this.expenses(db);

    await expenses.createIndex({ id: 1 }, { unique: true });
    await expenses.createIndex({ category: 1 }, { collation: CASE_INSENSITIVE });
    await expenses.createIndex({ date: 1 });

    await this.counters(db).updateOne(
      { _id: 'expenses' },
      { $setOnInsert: { seq: 0 } },
      { upsert: true }
    );
  }

  private async nextId(db: Db, session: ClientSession): Promise<number> {
    const counter = await this.counters(db).findOneAndUpdate(
      { _id: 'expenses' },
      { $inc: { seq: 1 } },
      { upsert: true, returnDocument: 'after', session }
    );
    if (!counter) {
      throw new Error('Failed to allocate an expense id');
    }
    return counter.seq;
  }

  async insert(expense: NewExpense): Promise<Expense> {
    return this.scoped(async (db, session) => {
      const id = await this.nextId(db, session);
      const record: Expense = { id, ...expense };
      // insertOne adds _id to the object it is given
      await this.expenses(db).insertOne({ ...record }, { session });
      return record;
    });
  }

  async getAll(): Promise<Expense[]> {
    return this.scoped(async (db, session) => {
      const docs = await this.expenses(db).find({}, { session }).sort({ id: 1 }).toArray();
      return docs.map(toExpense);
    });
  }

  async getById(id: number): Promise<Expense | null> {
    return this.scoped(async (db, session) => {
      const doc = await this.expenses(db).findOne({ id }, { session });
      return doc ? toExpense(doc) : null;
    });
  }

  async findByCategory(category: string): Promise<Expense[]> {
    return this.scoped(async (db, session) => {
      const docs = await this.expenses(db)
        .find({ category }, { session, collation: CASE_INSENSITIVE })
        .sort({ id: 1 })
        .toArray();
      return docs.map(toExpense);
    });
  }

  async findByDateRange(range: DateRange): Promise<Expense[]> {
    return this.scoped(async (db, session) => {
      // ISO dates compare correctly as strings
      const date = range.start ? { $gte: range.start, $lte: range.end } : { $lte: range.end };
      const docs = await this.expenses(db).find({ date }, { session }).sort({ id: 1 }).toArray();
      return docs.map(toExpense);
    });
  }

  async update(id: number, updates: Partial<NewExpense>): Promise<Expense | null> {
    return this.scoped(async (db, session) => {
      const doc = await this.expenses(db).findOneAndUpdate(
        { id },
        { $set: updates },
        { returnDocument: 'after', session }
      );
      return doc ? toExpense(doc) : null;
    });
  }

  async delete(id: number): Promise<Expense | null> {
    return this.scoped(async (db, session) => {
      const doc = await this.expenses(db).findOneAndDelete({ id }, { session });
      return doc ? toExpense(doc) : null;
    });
  }

  async close(): Promise<void> {
    await this.client.close();
    this.db = null;
    this.connecting = null;
  }
}
