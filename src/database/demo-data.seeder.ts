import { promises as fs } from 'fs';
import { Injectable, Logger } from '@nestjs/common';
import * as path from 'path';
import { DatabaseService } from './database.service';

/** Loads `sql/seeds/demo-data.sql`, but only into a database without companies. */
@Injectable()
export class DemoDataSeeder {
  private readonly logger = new Logger(DemoDataSeeder.name);
  private readonly seedFile = path.resolve(
    __dirname,
    '..',
    '..',
    'sql',
    'seeds',
    'demo-data.sql',
  );

  constructor(private readonly database: DatabaseService) {}

  async seed(): Promise<boolean> {
    const content = await fs.readFile(this.seedFile, 'utf8');
    return this.database.withTransaction(async (client) => {
      const existing = await client.query<{ count: number }>(
        'SELECT count(*)::int AS count FROM company',
      );
      const companies = existing.rows[0]?.count ?? 0;
      if (companies > 0) {
        this.logger.log(`Database already holds ${companies} companies, skipping demo data`);
        return false;
      }
      await client.query(content);
      this.logger.log('Demo data loaded');
      return true;
    });
  }
}
