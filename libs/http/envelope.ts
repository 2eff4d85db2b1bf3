import { MessageKey, describeMessage } from '../errors/messageKeys.js';

/**
 * Uniform response body for every request, success or failure.
 * `success` is true exactly when `errorCode` is null.
 */
export interface ResponseEnvelope<T> {
    readonly success: boolean;
    readonly messageKey: MessageKey;
    readonly message: string;
    readonly errorCode: string | null;
    readonly statusCode: number;
    readonly data: T | null;
    readonly timestamp: string;
}

export interface SuccessOptions {
    messageKey?: MessageKey;
    statusCode?: number;
    now?: () => Date;
}

export function successEnvelope<T>(data: T, options: SuccessOptions = {}): ResponseEnvelope<T> {
    const messageKey = options.messageKey ?? MessageKey.Success;
    return Object.freeze({
        success: true,
        messageKey,
        message: describeMessage(messageKey),
        errorCode: null,
        statusCode: options.statusCode ?? 200,
        data,
        timestamp: (options.now ?? (() => new Date()))().toISOString()
    });
}

export interface FailureEnvelopeInit<T> {
    messageKey: MessageKey;
    message: string;
    errorCode: string;
    statusCode: number;
    data: T | null;
    timestamp: Date;
}

/**
 * Only the failure translator calls this.
 */
export function failureEnvelope<T>(init: FailureEnvelopeInit<T>): ResponseEnvelope<T> {
    return Object.freeze({
        success: false,
        messageKey: init.messageKey,
        message: init.message,
        errorCode: init.errorCode,
        statusCode: init.statusCode,
        data: init.data,
        timestamp: init.timestamp.toISOString()
    });
}
