export enum ProtocolMessageType {
    SetChunkSize = 1,
    AbortMessage = 2,
    Acknowledgement = 3,
    UserControl = 4,
    WindowAcknowledgementSize = 5,
    SetPeerBandwidth = 6,
    Audio = 8,
    Video = 9,
    DataAMF3 = 15,
    SharedObjectAMF3 = 16,
    CommandAMF3 = 17,
    DataAMF0 = 18,
    SharedObjectAMF0 = 19,
    CommandAMF0 = 20,
    Aggregate = 22
}

export enum UserControlEventType {
    StreamBegin = 0,
    StreamEOF = 1,
    StreamDry = 2,
    SetBufferLength = 3,
    StreamIsRecorded = 4,
    PingRequest = 6,
    PingResponse = 7
}

/**
 * How the peer should apply a Set Peer Bandwidth message to its output window
 * https://rtmp.veriskope.com/docs/spec/#545set-peer-bandwidth-6
 */
export enum PeerBandwidthLimitType {
    Hard = 0,
    Soft = 1,
    Dynamic = 2
}

/**
 * Body sizes (in bytes) of the fixed-layout protocol control messages. User control messages
 * depend on their event type, see USER_CONTROL_EVENT_LENGTHS.
 */
export type FixedLengthMessageType =
    | ProtocolMessageType.SetChunkSize
    | ProtocolMessageType.AbortMessage
    | ProtocolMessageType.Acknowledgement
    | ProtocolMessageType.WindowAcknowledgementSize
    | ProtocolMessageType.SetPeerBandwidth
;

export const CONTROL_MESSAGE_LENGTHS : Record<FixedLengthMessageType, number> = {
    [ProtocolMessageType.SetChunkSize]: 4,
    [ProtocolMessageType.AbortMessage]: 4,
    [ProtocolMessageType.Acknowledgement]: 4,
    [ProtocolMessageType.WindowAcknowledgementSize]: 4,
    [ProtocolMessageType.SetPeerBandwidth]: 5
};

export const USER_CONTROL_EVENT_TYPE_LENGTH = 2;

export const USER_CONTROL_EVENT_LENGTHS : Record<UserControlEventType, number> = {
    [UserControlEventType.StreamBegin]: 6,
    [UserControlEventType.StreamEOF]: 6,
    [UserControlEventType.StreamDry]: 6,
    [UserControlEventType.SetBufferLength]: 10,
    [UserControlEventType.StreamIsRecorded]: 6,
    [UserControlEventType.PingRequest]: 6,
    [UserControlEventType.PingResponse]: 6
};
