import { createPool } from '../connection';
import { seedDevCollections } from './dev-collections';

async function main(): Promise<void> {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    process.stderr.write('DATABASE_URL environment variable is required\n');
    process.exit(1);
  }

  const pool = createPool({ connectionString, max: 1 });

  try {
    await seedDevCollections(pool);
    process.stdout.write('Seeded development collections\n');
  } catch (error) {
    process.stderr.write(`Error seeding data: ${String(error)}\n`);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void main();
