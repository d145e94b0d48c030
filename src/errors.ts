/**
 * Base class for every error raised by the protocol core.
 */
export class RtmpError extends Error {
    constructor(message : string, cause? : unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = new.target.name;
    }
}

/**
 * A message value could not be written to its wire layout.
 */
export class MessageSerializationError extends RtmpError {
}

/**
 * A message body was truncated, carried an unsupported message type, or contained an invalid
 * discriminant. The message is rejected; whether the connection survives is up to the caller.
 */
export class MessageDeserializationError extends RtmpError {
}

/**
 * A reply referenced a transaction ID with no pending request: the peer answered something
 * that was never asked, or answered twice.
 */
export class UnknownTransactionError extends RtmpError {
    constructor(readonly transactionId : number) {
        super(`No outstanding transaction with ID ${transactionId}`);
    }
}

export class DuplicateTransactionError extends RtmpError {
    constructor(readonly transactionId : number) {
        super(`Transaction ID ${transactionId} is already pending`);
    }
}

/**
 * A reply arrived for a known transaction but does not have the shape the request expects.
 */
export class UnexpectedReplyError extends RtmpError {
}
