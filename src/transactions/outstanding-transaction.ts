export type PublishRequestType = 'live' | 'record' | 'append';

/**
 * What a stream requested through createStream will be used for once its ID is known.
 */
export type TransactionPurpose =
    | { readonly kind : 'playRequest', readonly streamKey : string }
    | { readonly kind : 'publishRequest', readonly streamKey : string, readonly requestType : PublishRequestType }
;

/**
 * Why a request was sent, recorded under its transaction ID until the reply arrives.
 */
export type OutstandingTransaction =
    | { readonly kind : 'connectionRequested', readonly appName : string }
    | { readonly kind : 'createStream', readonly purpose : TransactionPurpose }
;
