import 'dotenv/config';
import { DatabaseService } from '../database/database.service';
import { DemoDataSeeder } from '../database/demo-data.seeder';
import { MigrationService } from '../database/migration.service';

async function main() {
  const database = new DatabaseService();
  if (!database.enabled) {
    throw new Error(
      'Database connection is not configured. Set DATABASE_URL or DB_HOST/DB_NAME/DB_USER.',
    );
  }
  try {
    await new MigrationService(database).runMigrations();
    await new DemoDataSeeder(database).seed();
  } finally {
    await database.onModuleDestroy();
  }
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
