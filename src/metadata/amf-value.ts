/**
 * A decoded AMF0 value as it appears in command arguments and data messages.
 */
export type AmfValue =
    | number
    | boolean
    | string
    | null
    | undefined
    | Date
    | AmfValue[]
    | AmfObject
;

export interface AmfObject {
    [key : string] : AmfValue;
}
