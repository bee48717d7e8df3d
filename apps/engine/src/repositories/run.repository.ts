import { SqlClient } from '../db';
import { RunEntity } from '../db/run.entity';
import { TransactionManager } from '../db/transaction.manager';
import { INSERT_EVENT_SQL } from './event.repository';
import { RunCatalog, RunRecord, StoredEvent } from './types';

function toRecord(row: RunEntity): RunRecord {
    return {
        id: row.id,
        templateId: row.template_id,
        templateVersion: row.template_version,
        scope: row.scope,
        parentRunId: row.parent_run_id,
        branchSequence: row.branch_sequence,
        createdAt: row.created_at,
    };
}

export class RunRepository implements RunCatalog {
    constructor(
        private readonly db: SqlClient,
        private readonly transactions: TransactionManager,
    ) { }

    async create(record: RunRecord, firstEvent: StoredEvent): Promise<void> {
        await this.transactions.run(async (client) => {
            await client.query(
                `INSERT INTO runs (id, template_id, template_version, scope, parent_run_id, branch_sequence, created_at)
                 VALUES ($1, $2, $3, $4, $5, $6, $7)`,
                [
                    record.id,
                    record.templateId,
                    record.templateVersion,
                    record.scope,
                    record.parentRunId,
                    record.branchSequence,
                    record.createdAt,
                ],
            );
            await client.query(INSERT_EVENT_SQL, [firstEvent.runId, firstEvent.sequence, firstEvent.type, firstEvent.body]);
        });
    }

    async findById(runId: string): Promise<RunRecord | null> {
        const res = await this.db.query('SELECT * FROM runs WHERE id = $1', [runId]);
        const row: RunEntity | undefined = res.rows[0];
        return row ? toRecord(row) : null;
    }

    async listIds(): Promise<string[]> {
        const res = await this.db.query('SELECT id FROM runs ORDER BY created_at ASC');
        return res.rows.map((row: Pick<RunEntity, 'id'>) => row.id);
    }
}
