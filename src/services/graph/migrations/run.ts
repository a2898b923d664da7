import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { logger } from '../../../utils/logger.js';
import { Neo4jClient } from '../Neo4jClient.js';

const CONSTRAINTS_FILE = fileURLToPath(new URL('../../../../db/constraints.cypher', import.meta.url));

/** Statements separated by `;`, with `//` comment lines removed. */
function parseCypherStatements(cypher: string): string[] {
  return cypher
    .split(';')
    .map(statement =>
      statement
        .split('\n')
        .filter(line => !line.trim().startsWith('//'))
        .join('\n')
        .trim()
    )
    .filter(statement => statement.length > 0);
}

async function runMigrations() {
  const client = new Neo4jClient();
  await client.connect();

  try {
    const statements = parseCypherStatements(await readFile(CONSTRAINTS_FILE, 'utf-8'));

    for (const statement of statements) {
      logger.info({ statement: statement.substring(0, 60) }, 'Executing');
      await client.run(statement);
    }

    logger.info({ statements: statements.length }, 'Migrations completed successfully');
  } catch (error) {
    logger.error({ error }, 'Migration failed');
    throw error;
  } finally {
    await client.disconnect();
  }
}

runMigrations().catch(err => {
  console.error('Fatal error:', err);
  process.exit(1);
});
