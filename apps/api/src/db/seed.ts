import { openScriptDb } from './script-env';
import { customers, products, orders } from './schema';

const CUSTOMERS = [
  { firstName: 'Alice', lastName: 'Johnson', email: 'alice@example.com', city: 'New York', signupDate: '2022-01-15' },
  { firstName: 'Bruno', lastName: 'Keller', email: 'bruno@example.com', city: 'Chicago', signupDate: '2022-02-03' },
  { firstName: 'Chloe', lastName: 'Nguyen', email: 'chloe@example.com', city: 'Seattle', signupDate: '2022-03-21' },
  { firstName: 'Dmitri', lastName: 'Ivanov', email: 'dmitri@example.com', city: 'Boston', signupDate: '2022-05-09' },
  { firstName: 'Elena', lastName: 'Garcia', email: 'elena@example.com', city: 'Austin', signupDate: '2022-06-30' },
  { firstName: 'Farid', lastName: 'Haddad', email: 'farid@example.com', city: 'New York', signupDate: '2022-08-14' },
  { firstName: 'Grace', lastName: 'Okafor', email: 'grace@example.com', city: 'Denver', signupDate: '2022-10-02' },
  { firstName: 'Hiro', lastName: 'Tanaka', email: 'hiro@example.com', city: 'San Francisco', signupDate: '2023-01-19' },
  { firstName: 'Ines', lastName: 'Moreau', email: 'ines@example.com', city: 'Chicago', signupDate: '2023-03-07' },
  { firstName: 'Jonas', lastName: 'Berg', email: 'jonas@example.com', city: 'Portland', signupDate: '2023-04-25' },
];

const PRODUCTS = [
  { name: 'Mechanical keyboard', category: 'Peripherals', price: '89.90' },
  { name: 'Wireless mouse', category: 'Peripherals', price: '24.50' },
  { name: '27" monitor', category: 'Displays', price: '249.00' },
  { name: 'USB-C dock', category: 'Accessories', price: '119.99' },
  { name: 'Laptop stand', category: 'Accessories', price: '39.00' },
  { name: 'Noise-cancelling headset', category: 'Audio', price: '179.00' },
];

async function seed() {
  const { client, db } = await openScriptDb();
  try {
    const customerRows = await db.insert(customers).values(CUSTOMERS).returning({ id: customers.id });
    const productRows = await db.insert(products).values(PRODUCTS).returning({ id: products.id });

    const start = new Date('2023-06-01T09:00:00Z');
    const orderRows = customerRows.flatMap((customer, c) =>
      [0, 1, 2].slice(0, 1 + (c % 3)).map((n) => {
        const product = productRows[(c + n * 2) % productRows.length];
        const orderedAt = new Date(start);
        orderedAt.setUTCDate(start.getUTCDate() + c * 4 + n);
        return {
          customerId: customer.id,
          productId: product.id,
          quantity: 1 + ((c + n) % 4),
          orderedAt,
        };
      }),
    );
    await db.insert(orders).values(orderRows);

    console.log(
      `Seed completed: ${customerRows.length} customers, ${productRows.length} products, ${orderRows.length} orders.`,
    );
  } finally {
    await client.end();
  }
}

seed().catch((e) => {
  console.error(e);
  process.exit(1);
});
