import { SqlClient } from './index';

export interface TransactionClient extends SqlClient {
    release(): void;
}

/** Satisfied by a pg Pool. */
export interface TransactionPool {
    connect(): Promise<TransactionClient>;
}

/**
 * Runs a callback inside BEGIN/COMMIT on one pooled connection,
 * rolling back when the callback throws.
 */
export class TransactionManager {
    constructor(private pool: TransactionPool) { }

    /**
     * @example
     * await txManager.run(async (client) => {
     *   await client.query('INSERT INTO runs ...');
     *   await client.query('INSERT INTO run_events ...');
     * });
     */
    async run<T>(callback: (client: SqlClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            const result = await callback(client);
            await client.query('COMMIT');
            return result;
        } catch (e) {
            await client.query('ROLLBACK');
            throw e;
        } finally {
            client.release();
        }
    }
}
