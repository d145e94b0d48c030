declare global {
    /**
     * When true, encoded and decoded protocol traffic is printed to the console.
     */
    var RTMP_TRACE : boolean | undefined;
}

export function trace(message : string) {
    if (globalThis.RTMP_TRACE === true)
        console.log(`RTMP: ${message}`);
}
