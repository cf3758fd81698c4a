import 'dotenv/config';
import { MongoClient } from 'mongodb';
import { createApp } from './app';
import { Config, loadConfig } from './config';
import { ExpenseStore, MongoExpenseStore } from './database';
import { ExpenseService } from './expenses';
import { MemoryExpenseStore } from './memoryStore';

export function createStore(config: Config): ExpenseStore {
  if (config.store === 'memory') {
    return new MemoryExpenseStore();
  }
  return new MongoExpenseStore(new MongoClient(config.mongoUri), {
    dbName: config.dbName,
    transactions: config.transactions
  });
}

// Initialize storage and start server
async function start(): Promise<void> {
  const config = loadConfig();
  const store = createStore(config);
  await store.init();

  const app = createApp(new ExpenseService(store));

  // Graceful shutdown
  const shutdown = () => {
    console.log('\nShutting down gracefully...');
    store.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Failed to close storage:', error);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  app.listen(config.port, () => {
    console.log(`Expense Tracker API running on http://localhost:${config.port} (${config.store} store)`);
    console.log('Available endpoints:');
    console.log('  POST   /expenses                 - Create a new expense');
    console.log('  GET    /expenses                 - List all expenses');
    console.log('  GET    /expenses/category/:name  - Expenses in a category');
    console.log('  GET    /expenses/search?q=       - Search expenses by category');
    console.log('  GET    /expenses/summary/:min    - Totals per category above a threshold');
    console.log('  GET    /expenses/datefilter      - Expenses between start_date and end_date');
    console.log('  GET    /expenses/id/:id          - Fetch one expense');
    console.log('  PUT    /expenses/:id             - Update an expense');
    console.log('  DELETE /expenses/:id             - Delete an expense');
  });
}

if (require.main === module) {
  start().catch((error: unknown) => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
}
