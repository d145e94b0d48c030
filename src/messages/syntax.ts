import 'reflect-metadata';
import { BitstreamElement, Field, Variant } from "@astronautlabs/bitstream";
import { ProtocolMessageType, UserControlEventType } from "./constants";

/**
 * Base of every fixed-layout protocol control message body. The chunk stream layer strips the
 * chunk headers and hands over exactly one body along with its message type ID.
 */
export abstract class ControlMessageData extends BitstreamElement {
    abstract readonly typeId : ProtocolMessageType;

    inspect() {
        return this.constructor.name.replace(/Data$/, '');
    }
}

export class SetChunkSizeData extends ControlMessageData {
    readonly typeId = ProtocolMessageType.SetChunkSize;

    /**
     * This bit MUST be zero.
     */
    @Field(1, { writtenValue: () => 0 }) zero : number = 0;

    /**
     * The new maximum chunk size in bytes, valid from 1 to 2147483647.
     */
    @Field(31) chunkSize! : number;

    inspect() { return `${super.inspect()}[size=${this.chunkSize}]`; }
}

/**
 * Tells the peer to discard the partially received message on the given chunk stream.
 */
export class AbortMessageData extends ControlMessageData {
    readonly typeId = ProtocolMessageType.AbortMessage;

    @Field(8*4) streamId! : number;

    inspect() { return `${super.inspect()}[stream=${this.streamId}]`; }
}

export class AcknowledgementData extends ControlMessageData {
    readonly typeId = ProtocolMessageType.Acknowledgement;

    /**
     * The number of bytes received so far.
     */
    @Field(8*4) sequenceNumber! : number;

    inspect() { return `${super.inspect()}[seq=${this.sequenceNumber}]`; }
}

export class WindowAcknowledgementSizeData extends ControlMessageData {
    readonly typeId = ProtocolMessageType.WindowAcknowledgementSize;

    @Field(8*4) acknowledgementWindowSize! : number;

    inspect() { return `${super.inspect()}[window=${this.acknowledgementWindowSize}]`; }
}

export class SetPeerBandwidthData extends ControlMessageData {
    readonly typeId = ProtocolMessageType.SetPeerBandwidth;

    @Field(8*4) acknowledgementWindowSize! : number;

    /**
     * One of PeerBandwidthLimitType.
     */
    @Field(8*1) limitType! : number;

    inspect() { return `${super.inspect()}[window=${this.acknowledgementWindowSize}, limit=${this.limitType}]`; }
}

export class UserControlData extends ControlMessageData {
    readonly typeId = ProtocolMessageType.UserControl;

    @Field(8*2) eventType! : number;

    inspect() { return `${super.inspect()}[event=${this.eventType}]`; }
}

/**
 * The server sends this to notify the client that a stream has become functional.
 */
@Variant<UserControlData>(i => i.eventType === UserControlEventType.StreamBegin)
export class StreamBeginEventData extends UserControlData {
    readonly eventType = UserControlEventType.StreamBegin;
    @Field(8*4) streamId! : number;
}

@Variant<UserControlData>(i => i.eventType === UserControlEventType.StreamEOF)
export class StreamEndEventData extends UserControlData {
    readonly eventType = UserControlEventType.StreamEOF;
    @Field(8*4) streamId! : number;
}

@Variant<UserControlData>(i => i.eventType === UserControlEventType.StreamDry)
export class StreamDryEventData extends UserControlData {
    readonly eventType = UserControlEventType.StreamDry;
    @Field(8*4) streamId! : number;
}

/**
 * The client tells the server how many milliseconds it buffers for the given stream.
 */
@Variant<UserControlData>(i => i.eventType === UserControlEventType.SetBufferLength)
export class SetBufferLengthEventData extends UserControlData {
    readonly eventType = UserControlEventType.SetBufferLength;
    @Field(8*4) streamId! : number;
    @Field(8*4) bufferLength! : number;
}

@Variant<UserControlData>(i => i.eventType === UserControlEventType.StreamIsRecorded)
export class StreamIsRecordedEventData extends UserControlData {
    readonly eventType = UserControlEventType.StreamIsRecorded;
    @Field(8*4) streamId! : number;
}

@Variant<UserControlData>(i => i.eventType === UserControlEventType.PingRequest)
export class PingRequestData extends UserControlData {
    readonly eventType = UserControlEventType.PingRequest;
    @Field(8*4) timestamp! : number;
}

@Variant<UserControlData>(i => i.eventType === UserControlEventType.PingResponse)
export class PingResponseData extends UserControlData {
    readonly eventType = UserControlEventType.PingResponse;
    @Field(8*4) timestamp! : number;
}

export type UserControlEvent =
    | StreamBeginEventData
    | StreamEndEventData
    | StreamDryEventData
    | SetBufferLengthEventData
    | StreamIsRecordedEventData
    | PingRequestData
    | PingResponseData
;

export type ProtocolControlMessage =
    | SetChunkSizeData
    | AbortMessageData
    | AcknowledgementData
    | WindowAcknowledgementSizeData
    | SetPeerBandwidthData
    | UserControlEvent
;
