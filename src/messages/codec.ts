import { MessageDeserializationError, MessageSerializationError } from "../errors";
import { trace } from "../util";
import {
    CONTROL_MESSAGE_LENGTHS, FixedLengthMessageType, PeerBandwidthLimitType, ProtocolMessageType, UserControlEventType,
    USER_CONTROL_EVENT_LENGTHS, USER_CONTROL_EVENT_TYPE_LENGTH
} from "./constants";
import {
    AbortMessageData, AcknowledgementData, PingRequestData, PingResponseData, ProtocolControlMessage,
    SetBufferLengthEventData, SetChunkSizeData, SetPeerBandwidthData, StreamBeginEventData, StreamDryEventData,
    StreamEndEventData, StreamIsRecordedEventData, UserControlData, UserControlEvent, WindowAcknowledgementSizeData
} from "./syntax";

function assertNever(value : never, what : string): never {
    throw new TypeError(`Unhandled ${what}: ${JSON.stringify(value)}`);
}

function requireUint(value : number, bits : number, field : string) {
    if (!Number.isInteger(value) || value < 0 || value >= 2**bits)
        throw new MessageSerializationError(`${field} must be an unsigned ${bits}-bit integer (got ${value})`);
}

function validate(message : ProtocolControlMessage) {
    switch (message.typeId) {
        case ProtocolMessageType.SetChunkSize:
            requireUint(message.chunkSize, 31, 'chunkSize');
            break;
        case ProtocolMessageType.AbortMessage:
            requireUint(message.streamId, 32, 'streamId');
            break;
        case ProtocolMessageType.Acknowledgement:
            requireUint(message.sequenceNumber, 32, 'sequenceNumber');
            break;
        case ProtocolMessageType.WindowAcknowledgementSize:
            requireUint(message.acknowledgementWindowSize, 32, 'acknowledgementWindowSize');
            break;
        case ProtocolMessageType.SetPeerBandwidth:
            requireUint(message.acknowledgementWindowSize, 32, 'acknowledgementWindowSize');
            if (!(message.limitType in PeerBandwidthLimitType))
                throw new MessageSerializationError(`Invalid peer bandwidth limit type ${message.limitType}`);
            break;
        case ProtocolMessageType.UserControl:
            validateUserControl(message);
            break;
        default:
            assertNever(message, 'protocol control message');
    }
}

function validateUserControl(event : UserControlEvent) {
    switch (event.eventType) {
        case UserControlEventType.StreamBegin:
        case UserControlEventType.StreamEOF:
        case UserControlEventType.StreamDry:
        case UserControlEventType.StreamIsRecorded:
            requireUint(event.streamId, 32, 'streamId');
            break;
        case UserControlEventType.SetBufferLength:
            requireUint(event.streamId, 32, 'streamId');
            requireUint(event.bufferLength, 32, 'bufferLength');
            break;
        case UserControlEventType.PingRequest:
        case UserControlEventType.PingResponse:
            requireUint(event.timestamp, 32, 'timestamp');
            break;
        default:
            assertNever(event, 'user control event');
    }
}

/**
 * Encode a protocol control message body. The result carries no length prefix or chunk header.
 */
export function serializeMessage(message : ProtocolControlMessage): Buffer {
    validate(message);

    let buffer : Buffer;
    try {
        buffer = Buffer.from(message.serialize());
    } catch (e) {
        throw new MessageSerializationError(`Failed to write ${message.inspect()}`, e);
    }

    trace(`🔼 ${message.inspect()} | type=${message.typeId}, length=${buffer.length}`);
    return buffer;
}

function requireBytes(bytes : Uint8Array, length : number, what : string) {
    if (bytes.length < length)
        throw new MessageDeserializationError(`${what} requires ${length} bytes, only ${bytes.length} available`);
}

function read<T>(what : string, reader : () => T): T {
    try {
        return reader();
    } catch (e) {
        if (e instanceof MessageDeserializationError)
            throw e;
        throw new MessageDeserializationError(`Failed to read ${what}`, e);
    }
}

function isUserControlEventType(value : number): value is UserControlEventType {
    return value in USER_CONTROL_EVENT_LENGTHS;
}

function asUserControlEvent(data : UserControlData): UserControlEvent {
    if (
        data instanceof StreamBeginEventData
        || data instanceof StreamEndEventData
        || data instanceof StreamDryEventData
        || data instanceof SetBufferLengthEventData
        || data instanceof StreamIsRecordedEventData
        || data instanceof PingRequestData
        || data instanceof PingResponseData
    ) {
        return data;
    }

    throw new MessageDeserializationError(`Unknown user control event type ${data.eventType}`);
}

function deserializeUserControl(bytes : Uint8Array): UserControlEvent {
    requireBytes(bytes, USER_CONTROL_EVENT_TYPE_LENGTH, 'UserControl');

    let eventType = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint16(0);
    if (!isUserControlEventType(eventType))
        throw new MessageDeserializationError(`Unknown user control event type ${eventType}`);

    let length = USER_CONTROL_EVENT_LENGTHS[eventType];
    requireBytes(bytes, length, `UserControl event ${UserControlEventType[eventType]}`);

    return asUserControlEvent(
        read('UserControl', () => UserControlData.deserialize(bytes.subarray(0, length)))
    );
}

function readFixed<T>(typeId : FixedLengthMessageType, bytes : Uint8Array, reader : (body : Uint8Array) => T): T {
    let name = ProtocolMessageType[typeId];
    let length = CONTROL_MESSAGE_LENGTHS[typeId];
    requireBytes(bytes, length, name);
    return read(name, () => reader(bytes.subarray(0, length)));
}

function deserializeBody(typeId : number, bytes : Uint8Array): ProtocolControlMessage {
    switch (typeId) {
        case ProtocolMessageType.SetChunkSize:
            return readFixed(ProtocolMessageType.SetChunkSize, bytes, body => SetChunkSizeData.deserialize(body));
        case ProtocolMessageType.AbortMessage:
            return deserializeAbort(bytes);
        case ProtocolMessageType.Acknowledgement:
            return readFixed(ProtocolMessageType.Acknowledgement, bytes, body => AcknowledgementData.deserialize(body));
        case ProtocolMessageType.WindowAcknowledgementSize:
            return readFixed(
                ProtocolMessageType.WindowAcknowledgementSize, bytes,
                body => WindowAcknowledgementSizeData.deserialize(body)
            );
        case ProtocolMessageType.SetPeerBandwidth: {
            let data = readFixed(ProtocolMessageType.SetPeerBandwidth, bytes, body => SetPeerBandwidthData.deserialize(body));
            if (!(data.limitType in PeerBandwidthLimitType))
                throw new MessageDeserializationError(`Invalid peer bandwidth limit type ${data.limitType}`);
            return data;
        }
        case ProtocolMessageType.UserControl:
            return deserializeUserControl(bytes);
        default:
            throw new MessageDeserializationError(`Message type ${typeId} is not a fixed-layout protocol control message`);
    }
}

/**
 * Decode one protocol control message body. The message type ID comes from the chunk header;
 * bytes past the end of the message's fixed layout are ignored.
 */
export function deserializeMessage(typeId : number, bytes : Uint8Array): ProtocolControlMessage {
    let message = deserializeBody(typeId, bytes);
    trace(`🔽 ${message.inspect()} | type=${typeId}, length=${bytes.length}`);
    return message;
}

export function serializeAbort(streamId : number): Buffer {
    return serializeMessage(new AbortMessageData().with({ streamId }));
}

export function deserializeAbort(bytes : Uint8Array): AbortMessageData {
    return readFixed(ProtocolMessageType.AbortMessage, bytes, body => AbortMessageData.deserialize(body));
}
