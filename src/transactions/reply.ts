import { UnexpectedReplyError } from "../errors";
import { OutstandingTransaction, PublishRequestType } from "./outstanding-transaction";

/**
 * The parts of a received _result / _error command needed to resolve it.
 */
export interface CommandReply {
    commandName : string;
    commandObject? : unknown;
    parameters : unknown[];
}

/**
 * The command to send on a freshly created stream.
 */
export type FollowUpCommand =
    | { commandName : 'play', messageStreamId : number, parameters : [ streamKey : string ] }
    | { commandName : 'publish', messageStreamId : number, parameters : [ streamKey : string, requestType : PublishRequestType ] }
;

export type TransactionOutcome =
    | { kind : 'connectionAccepted', appName : string }
    | { kind : 'streamCreated', streamId : number, followUp : FollowUpCommand }
    | { kind : 'rejected', transaction : OutstandingTransaction, description? : string }
;

function statusDescription(info : unknown) {
    if (typeof info === 'object' && info !== null && 'description' in info && typeof info.description === 'string')
        return info.description;
    return undefined;
}

function followUpFor(transaction : Extract<OutstandingTransaction, { kind : 'createStream' }>, streamId : number): FollowUpCommand {
    let purpose = transaction.purpose;
    switch (purpose.kind) {
        case 'playRequest':
            return { commandName: 'play', messageStreamId: streamId, parameters: [ purpose.streamKey ] };
        case 'publishRequest':
            return {
                commandName: 'publish',
                messageStreamId: streamId,
                parameters: [ purpose.streamKey, purpose.requestType ]
            };
    }
}

/**
 * Interpret a reply against the request it answers. The transaction must already have been
 * taken from its ledger.
 */
export function resolveTransaction(transaction : OutstandingTransaction, reply : CommandReply): TransactionOutcome {
    if (reply.commandName === '_error') {
        return {
            kind: 'rejected',
            transaction,
            description: statusDescription(reply.parameters[0])
        };
    }

    if (reply.commandName !== '_result')
        throw new UnexpectedReplyError(`Expected _result or _error for ${transaction.kind}, got '${reply.commandName}'`);

    switch (transaction.kind) {
        case 'connectionRequested':
            return { kind: 'connectionAccepted', appName: transaction.appName };
        case 'createStream': {
            let streamId = reply.parameters[0];
            if (typeof streamId !== 'number' || !Number.isInteger(streamId) || streamId < 0 || streamId > 0xFFFFFFFF)
                throw new UnexpectedReplyError(`createStream _result carried no valid stream ID (got ${JSON.stringify(streamId)})`);

            return { kind: 'streamCreated', streamId, followUp: followUpFor(transaction, streamId) };
        }
    }
}
