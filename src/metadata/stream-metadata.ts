import { AmfObject, AmfValue } from "./amf-value";

/**
 * Metadata a stream may advertise on publishing (the onMetaData data frame). Every field is
 * optional: a missing field was not advertised, which is not the same as zero.
 */
export interface StreamMetadata {
    videoWidth? : number;
    videoHeight? : number;
    videoCodecId? : number;
    videoFrameRate? : number;
    videoBitrateKbps? : number;
    audioCodecId? : number;
    audioBitrateKbps? : number;
    audioSampleRate? : number;
    audioChannels? : number;
    audioIsStereo? : boolean;
    encoder? : string;
}

export function createStreamMetadata(): StreamMetadata {
    return {};
}

type NumericField = {
    [K in keyof StreamMetadata]-? : NonNullable<StreamMetadata[K]> extends number ? K : never
}[keyof StreamMetadata];

interface MetadataProperty {
    readonly key : string;
    read(value : AmfValue, metadata : StreamMetadata) : void;
    write(metadata : Readonly<StreamMetadata>, properties : AmfObject) : void;
}

const toUint32 = (value : number) => Number.isNaN(value) ? 0 : Math.min(Math.max(Math.trunc(value), 0), 0xFFFFFFFF);
const toFloat32 = (value : number) => Math.fround(value);
const unchanged = (value : number) => value;

function numberProperty(key : string, field : NumericField, narrow : (value : number) => number): MetadataProperty {
    return {
        key,
        read: (value, metadata) => {
            if (typeof value === 'number')
                metadata[field] = narrow(value);
        },
        write: (metadata, properties) => {
            let value = metadata[field];
            if (value !== undefined)
                properties[key] = value;
        }
    };
}

const METADATA_PROPERTIES : readonly MetadataProperty[] = [
    numberProperty('width', 'videoWidth', toUint32),
    numberProperty('height', 'videoHeight', toUint32),
    numberProperty('videocodecid', 'videoCodecId', unchanged),
    numberProperty('videodatarate', 'videoBitrateKbps', toUint32),
    numberProperty('framerate', 'videoFrameRate', toFloat32),
    numberProperty('audiocodecid', 'audioCodecId', unchanged),
    numberProperty('audiodatarate', 'audioBitrateKbps', toUint32),
    numberProperty('audiosamplerate', 'audioSampleRate', toUint32),
    numberProperty('audiochannels', 'audioChannels', toUint32),
    {
        key: 'stereo',
        read: (value, metadata) => {
            if (typeof value === 'boolean')
                metadata.audioIsStereo = value;
        },
        write: (metadata, properties) => {
            if (metadata.audioIsStereo !== undefined)
                properties.stereo = metadata.audioIsStereo;
        }
    },
    {
        key: 'encoder',
        read: (value, metadata) => {
            if (typeof value === 'string')
                metadata.encoder = value;
        },
        write: (metadata, properties) => {
            if (metadata.encoder !== undefined)
                properties.encoder = metadata.encoder;
        }
    }
];

/**
 * Read the recognized onMetaData properties. Unknown keys and values of the wrong kind are
 * skipped, leaving the field absent.
 */
export function metadataFromProperties(properties : Readonly<AmfObject>): StreamMetadata {
    let metadata = createStreamMetadata();

    for (let property of METADATA_PROPERTIES) {
        if (Object.prototype.hasOwnProperty.call(properties, property.key))
            property.read(properties[property.key], metadata);
    }

    return metadata;
}

/**
 * Produce the onMetaData property map. Absent fields produce no key.
 */
export function metadataToProperties(metadata : Readonly<StreamMetadata>): AmfObject {
    let properties : AmfObject = {};

    for (let property of METADATA_PROPERTIES)
        property.write(metadata, properties);

    return properties;
}

function isAmfObject(value : AmfValue): value is AmfObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Parse the arguments of an AMF0 data message carrying stream metadata, either as sent by a
 * publisher (`@setDataFrame`, `onMetaData`, properties) or as relayed to players (`onMetaData`,
 * properties). Returns undefined for any other data message.
 */
export function metadataFromDataFrame(args : readonly AmfValue[]): StreamMetadata | undefined {
    let offset = args[0] === '@setDataFrame' ? 1 : 0;
    if (args[offset] !== 'onMetaData')
        return undefined;

    let properties = args[offset + 1];
    if (!isAmfObject(properties))
        return undefined;

    return metadataFromProperties(properties);
}

export function metadataToDataFrame(metadata : Readonly<StreamMetadata>): [ '@setDataFrame', 'onMetaData', AmfObject ] {
    return [ '@setDataFrame', 'onMetaData', metadataToProperties(metadata) ];
}
