/**
 * Event Relay
 *
 * Copies committed journal records to the PostgreSQL event store. Each batch
 * is written in one transaction; inserts are idempotent on the stream and
 * sequence, so a batch retried after a partial failure never duplicates rows.
 * A fallback polling loop keeps the store close to the journal head.
 *
 * Rows are keyed by (stream_id, sequence). An engine instance writes to its
 * own stream, so a restarted in-memory engine never collides with the rows
 * of its predecessor.
 */

import { randomUUID } from 'node:crypto';
import { db, DbClient, DbRole } from '../db/index.js';
import { CredentialEventRecord } from '../events/schema.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('EventRelay');

const DEFAULT_BATCH_SIZE = 100;
const DEFAULT_POLL_INTERVAL_MS = 1000;

export interface EventSource {
    eventsSince(fromSequence: number): readonly CredentialEventRecord[];
}

export interface EventRelayOptions {
    /** Defaults to a fresh id per relay */
    streamId?: string;
    batchSize?: number;
    pollIntervalMs?: number;
}

export const INSERT_EVENT_SQL = `INSERT INTO credential_events
    (stream_id, sequence, event_type, occurred_at, payload, prev_hash, hash)
    VALUES ($1, $2, $3, to_timestamp($4), $5, $6, $7)
    ON CONFLICT (stream_id, sequence) DO NOTHING`;

export const LAST_SEQUENCE_SQL = 'SELECT MAX(sequence) AS last_sequence FROM credential_events WHERE stream_id = $1';

export class EventRelay {
    private nextSequence = 0;
    private isRunning = false;
    private inFlightPoll: Promise<void> | null = null;
    private pollTimer: NodeJS.Timeout | null = null;
    public readonly streamId: string;
    private readonly batchSize: number;
    private readonly pollIntervalMs: number;

    constructor(
        private readonly source: EventSource,
        private readonly role: DbRole = 'credentials_writer',
        private readonly dbClient: DbClient = db,
        options: EventRelayOptions = {}
    ) {
        this.streamId = options.streamId ?? randomUUID();
        this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
        this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    }

    /**
     * Resumes after the highest sequence already stored for this stream.
     */
    public async initialize(): Promise<void> {
        const res = await this.dbClient.queryAsRole<{ last_sequence: string | number | null }>(
            this.role,
            LAST_SEQUENCE_SQL,
            [this.streamId]
        );
        const last = res.rows[0]?.last_sequence;
        this.nextSequence = last === null || last === undefined ? 0 : Number(last) + 1;
        logger.info({ streamId: this.streamId, nextSequence: this.nextSequence }, 'EventRelay resumed');
    }

    public get pendingFrom(): number {
        return this.nextSequence;
    }

    /**
     * Relays everything currently pending. Returns the number of records written.
     */
    public async flush(): Promise<number> {
        let relayed = 0;
        for (;;) {
            const batch = this.source.eventsSince(this.nextSequence).slice(0, this.batchSize);
            if (batch.length === 0) break;

            await this.dbClient.transactionAsRole(this.role, async (tx) => {
                for (const record of batch) {
                    await tx.query(INSERT_EVENT_SQL, [
                        this.streamId,
                        record.sequence,
                        record.eventType,
                        record.timestamp,
                        JSON.stringify(record.payload),
                        record.integrity.prevHash,
                        record.integrity.hash
                    ]);
                }
            });

            const last = batch[batch.length - 1];
            if (last) {
                this.nextSequence = last.sequence + 1;
            }
            relayed += batch.length;
        }

        if (relayed > 0) {
            logger.info({ relayed, nextSequence: this.nextSequence }, 'Credential events relayed');
        }
        return relayed;
    }

    public start(): void {
        if (this.isRunning) {
            logger.warn('EventRelay already running');
            return;
        }
        this.isRunning = true;
        this.pollTimer = setInterval(() => this.poll(), this.pollIntervalMs);
        this.poll();
        logger.info({ streamId: this.streamId }, 'EventRelay started');
    }

    /**
     * Stops polling and relays whatever is still pending. Resolves only after
     * a poll already under way has settled, so the pool can be closed next.
     */
    public async stop(): Promise<void> {
        this.isRunning = false;
        if (this.pollTimer) {
            clearInterval(this.pollTimer);
            this.pollTimer = null;
        }
        if (this.inFlightPoll) {
            await this.inFlightPoll;
        }
        await this.flush();
        logger.info('EventRelay stopped');
    }

    private poll(): void {
        if (!this.isRunning || this.inFlightPoll) return;
        this.inFlightPoll = this.flush()
            .then(() => undefined, (error: unknown) => {
                logger.error({ error }, 'EventRelay poll failed; will retry on next interval');
            })
            .finally(() => {
                this.inFlightPoll = null;
            });
    }
}
