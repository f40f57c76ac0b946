import { sql } from 'drizzle-orm';
import { openScriptDb } from './script-env';
import { customers, products, orders } from './schema';

async function reset() {
  const { client, db } = await openScriptDb();
  try {
    await db.delete(orders);
    await db.delete(customers);
    await db.delete(products);

    for (const table of ['customers', 'products', 'orders']) {
      await db.execute(sql.raw(`SELECT setval(pg_get_serial_sequence('${table}', 'id'), 1, false)`));
    }
    console.log('Database reset done.');
  } finally {
    await client.end();
  }
}

reset()
  .then(() => process.exit(0))
  .catch((e) => {
    console.error(e);
    process.exit(1);
  });
