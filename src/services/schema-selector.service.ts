import type { Logger } from '../logger.js';
import type { ConnectionSettings, MysqlClientService } from './mysql-client.service.js';
import type { Prompter } from './prompt.service.js';

/**
 * Schemas that belong to the server itself and are never offered for deletion
 */
export const SYSTEM_SCHEMAS = new Set(['information_schema', 'mysql', 'performance_schema', 'sys']);

export type SchemaSelection =
  | { status: 'selected'; schema: string }
  | { status: 'declined'; schema: string }
  | { status: 'invalid'; input: string; reason: string }
  | { status: 'error'; error: string };

/**
 * Map an answer to a schema name. Accepts the name itself or its 1-based list number;
 * a schema whose name is a number wins over the list position.
 */
export function resolveSchemaChoice(answer: string, schemas: string[]): string | undefined {
  const trimmed = answer.trim();
  if (schemas.includes(trimmed)) return trimmed;
  if (/^\d+$/.test(trimmed)) {
    const index = parseInt(trimmed, 10) - 1;
    if (index >= 0 && index < schemas.length) return schemas[index];
  }
  return undefined;
}

/**
 * Schema Selector Service
 * Lets the operator pick an existing schema to delete and confirm it.
 */
export class SchemaSelectorService {
  constructor(
    private readonly client: MysqlClientService,
    private readonly prompter: Prompter,
    private readonly logger: Logger
  ) {}

  async select(conn: ConnectionSettings): Promise<SchemaSelection> {
    const listed = await this.client.listSchemas(conn);
    if (!listed.success) {
      return { status: 'error', error: listed.error ?? 'Could not list schemas' };
    }

    const schemas = listed.schemas.filter((name) => !SYSTEM_SCHEMAS.has(name));
    if (schemas.length === 0) {
      return { status: 'invalid', input: '', reason: 'There are no schemas to delete' };
    }

    this.logger.info('Existing schemas:');
    schemas.forEach((name, i) => this.logger.info(`  ${i + 1}) ${name}`));

    const answer = await this.prompter.ask('Schema to delete (name or number): ');
    const schema = resolveSchemaChoice(answer, schemas);
    if (schema === undefined) {
      return { status: 'invalid', input: answer, reason: `'${answer}' is not one of the listed schemas` };
    }

    const confirmed = await this.prompter.confirm(`Delete schema '${schema}'? This cannot be undone.`);
    if (!confirmed) {
      return { status: 'declined', schema };
    }

    return { status: 'selected', schema };
  }
}
