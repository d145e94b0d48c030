import { DuplicateTransactionError, UnknownTransactionError } from "../errors";
import { trace } from "../util";
import { OutstandingTransaction, TransactionPurpose } from "./outstanding-transaction";
import { CommandReply, resolveTransaction, TransactionOutcome } from "./reply";

/**
 * What register() does when the transaction ID is already pending.
 * - `overwrite`: the new entry replaces the old one
 * - `reject`: throw DuplicateTransactionError
 */
export type CollisionPolicy = 'overwrite' | 'reject';

export interface TransactionLedgerOptions {
    collisionPolicy? : CollisionPolicy;
}

const MAX_TRANSACTION_ID = 0xFFFFFFFF;

function freeze(entry : OutstandingTransaction): OutstandingTransaction {
    switch (entry.kind) {
        case 'connectionRequested':
            return Object.freeze({ kind: entry.kind, appName: entry.appName });
        case 'createStream':
            return Object.freeze({ kind: entry.kind, purpose: Object.freeze<TransactionPurpose>({ ...entry.purpose }) });
    }
}

function describeTransaction(entry : OutstandingTransaction) {
    switch (entry.kind) {
        case 'connectionRequested':
            return `connect('${entry.appName}')`;
        case 'createStream':
            return `createStream(${entry.purpose.kind}: '${entry.purpose.streamKey}')`;
    }
}

/**
 * Remembers why each pending request was sent so its reply can be interpreted. Each connection
 * owns its own ledger; entries are consumed exactly once, by take() or resolve().
 */
export class TransactionLedger {
    constructor(options : TransactionLedgerOptions = {}) {
        this.collisionPolicy = options.collisionPolicy ?? 'overwrite';
    }

    collisionPolicy : CollisionPolicy;

    private transactions = new Map<number, OutstandingTransaction>();
    private nextTransactionId = 1;

    /**
     * Number of requests still waiting for a reply.
     */
    get size() {
        return this.transactions.size;
    }

    private validateId(transactionId : number) {
        if (!Number.isInteger(transactionId) || transactionId < 0 || transactionId > MAX_TRANSACTION_ID)
            throw new TypeError(`Transaction ID must be an unsigned 32-bit integer (got ${transactionId})`);
    }

    register(transactionId : number, entry : OutstandingTransaction) {
        this.validateId(transactionId);

        if (this.transactions.has(transactionId)) {
            if (this.collisionPolicy === 'reject')
                throw new DuplicateTransactionError(transactionId);
            trace(`Transaction ${transactionId} replaced while still pending`);
        }

        this.transactions.set(transactionId, freeze(entry));
        trace(`⌚ [txn=${transactionId}] ${describeTransaction(entry)}`);
    }

    /**
     * Register the entry under the next transaction ID that is not pending, and return that ID.
     * IDs count up from 1, the ID used for connect.
     */
    registerNext(entry : OutstandingTransaction): number {
        while (this.transactions.has(this.nextTransactionId))
            this.nextTransactionId = this.advance(this.nextTransactionId);

        let transactionId = this.nextTransactionId;
        this.nextTransactionId = this.advance(transactionId);
        this.register(transactionId, entry);
        return transactionId;
    }

    private advance(transactionId : number) {
        return transactionId >= MAX_TRANSACTION_ID ? 1 : transactionId + 1;
    }

    /**
     * Remove and return the entry for a transaction. Throws UnknownTransactionError when no
     * request is pending under that ID.
     */
    take(transactionId : number): OutstandingTransaction {
        let entry = this.transactions.get(transactionId);
        if (!entry)
            throw new UnknownTransactionError(transactionId);

        this.transactions.delete(transactionId);
        trace(`✅ [txn=${transactionId}] ${describeTransaction(entry)}`);
        return entry;
    }

    /**
     * Take the entry for the reply's transaction and interpret the reply against it.
     */
    resolve(transactionId : number, reply : CommandReply): TransactionOutcome {
        return resolveTransaction(this.take(transactionId), reply);
    }

    /**
     * Forget every pending request, for when the connection closes.
     */
    clear() {
        this.transactions.clear();
    }
}
