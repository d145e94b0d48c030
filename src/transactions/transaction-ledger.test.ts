import { DuplicateTransactionError, UnexpectedReplyError, UnknownTransactionError } from "../errors";
import { OutstandingTransaction } from "./outstanding-transaction";
import { TransactionLedger } from "./transaction-ledger";

const connectLive : OutstandingTransaction = { kind: 'connectionRequested', appName: 'live' };
const createForPlay : OutstandingTransaction = {
    kind: 'createStream',
    purpose: { kind: 'playRequest', streamKey: 'camera1' }
};
const createForPublish : OutstandingTransaction = {
    kind: 'createStream',
    purpose: { kind: 'publishRequest', streamKey: 'camera2', requestType: 'record' }
};

describe('TransactionLedger', () => {
    it('returns a registered entry exactly once', () => {
        let ledger = new TransactionLedger();
        ledger.register(7, connectLive);

        expect(ledger.take(7)).toEqual({ kind: 'connectionRequested', appName: 'live' });
        expect(() => ledger.take(7)).toThrow(UnknownTransactionError);
    });

    it('reports the unknown transaction ID', () => {
        let ledger = new TransactionLedger();
        let error : unknown;
        try {
            ledger.take(42);
        } catch (e) {
            error = e;
        }

        expect(error).toBeInstanceOf(UnknownTransactionError);
        expect(error).toMatchObject({ transactionId: 42, name: 'UnknownTransactionError' });
    });

    it('overwrites a pending entry by default', () => {
        let ledger = new TransactionLedger();
        ledger.register(3, createForPlay);
        ledger.register(3, createForPublish);

        expect(ledger.size).toBe(1);
        expect(ledger.take(3)).toEqual(createForPublish);
        expect(ledger.size).toBe(0);
    });

    it('can reject a colliding registration', () => {
        let ledger = new TransactionLedger({ collisionPolicy: 'reject' });
        ledger.register(3, createForPlay);

        expect(() => ledger.register(3, createForPublish)).toThrow(DuplicateTransactionError);
        expect(ledger.take(3)).toEqual(createForPlay);
    });

    it('allows an ID to be reused after its reply was taken', () => {
        let ledger = new TransactionLedger({ collisionPolicy: 'reject' });
        ledger.register(2, createForPlay);
        ledger.take(2);
        ledger.register(2, createForPublish);

        expect(ledger.take(2)).toEqual(createForPublish);
    });

    it('keeps its own frozen copy of each entry', () => {
        let ledger = new TransactionLedger();
        let purpose = { kind: 'playRequest' as const, streamKey: 'camera1' };
        ledger.register(5, { kind: 'createStream', purpose });
        purpose.streamKey = 'changed';

        let entry = ledger.take(5);
        expect(entry).toEqual(createForPlay);
        expect(Object.isFrozen(entry)).toBe(true);
        if (entry.kind === 'createStream')
            expect(Object.isFrozen(entry.purpose)).toBe(true);
    });

    it.each([ -1, 1.5, 2**32, NaN ])('refuses transaction ID %d', transactionId => {
        let ledger = new TransactionLedger();
        expect(() => ledger.register(transactionId, connectLive)).toThrow(TypeError);
    });

    it('hands out IDs that are not pending', () => {
        let ledger = new TransactionLedger();

        expect(ledger.registerNext(connectLive)).toBe(1);
        expect(ledger.registerNext(createForPlay)).toBe(2);

        ledger.register(3, createForPublish);
        expect(ledger.registerNext(createForPlay)).toBe(4);
        expect(ledger.size).toBe(4);
    });

    it('forgets everything on clear()', () => {
        let ledger = new TransactionLedger();
        ledger.register(1, connectLive);
        ledger.register(2, createForPlay);
        ledger.clear();

        expect(ledger.size).toBe(0);
        expect(() => ledger.take(1)).toThrow(UnknownTransactionError);
    });
});

describe('TransactionLedger.resolve', () => {
    it('accepts a connection', () => {
        let ledger = new TransactionLedger();
        ledger.register(1, connectLive);

        let outcome = ledger.resolve(1, {
            commandName: '_result',
            commandObject: { fmsVer: 'FMS/3,0,1,123' },
            parameters: [ { level: 'status', code: 'NetConnection.Connect.Success' } ]
        });

        expect(outcome).toEqual({ kind: 'connectionAccepted', appName: 'live' });
        expect(ledger.size).toBe(0);
    });

    it('plays on a stream created for playback', () => {
        let ledger = new TransactionLedger();
        ledger.register(2, createForPlay);

        expect(ledger.resolve(2, { commandName: '_result', parameters: [ 1 ] })).toEqual({
            kind: 'streamCreated',
            streamId: 1,
            followUp: { commandName: 'play', messageStreamId: 1, parameters: [ 'camera1' ] }
        });
    });

    it('publishes on a stream created for publishing', () => {
        let ledger = new TransactionLedger();
        ledger.register(4, createForPublish);

        expect(ledger.resolve(4, { commandName: '_result', parameters: [ 3 ] })).toEqual({
            kind: 'streamCreated',
            streamId: 3,
            followUp: { commandName: 'publish', messageStreamId: 3, parameters: [ 'camera2', 'record' ] }
        });
    });

    it('reports an _error reply as a rejection', () => {
        let ledger = new TransactionLedger();
        ledger.register(1, connectLive);

        expect(ledger.resolve(1, {
            commandName: '_error',
            parameters: [ { level: 'error', code: 'NetConnection.Connect.Rejected', description: 'Not allowed' } ]
        })).toEqual({ kind: 'rejected', transaction: connectLive, description: 'Not allowed' });
    });

    it('rejects a createStream result without a stream ID, consuming the entry', () => {
        let ledger = new TransactionLedger();
        ledger.register(2, createForPlay);

        expect(() => ledger.resolve(2, { commandName: '_result', parameters: [ 'one' ] })).toThrow(UnexpectedReplyError);
        expect(ledger.size).toBe(0);
    });

    it('rejects replies that are neither _result nor _error', () => {
        let ledger = new TransactionLedger();
        ledger.register(1, connectLive);

        expect(() => ledger.resolve(1, { commandName: 'onStatus', parameters: [] })).toThrow(UnexpectedReplyError);
    });

    it('reports replies to unknown transactions', () => {
        let ledger = new TransactionLedger();
        expect(() => ledger.resolve(9, { commandName: '_result', parameters: [ 1 ] })).toThrow(UnknownTransactionError);
    });
});
