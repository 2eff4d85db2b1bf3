/**
 * Failure Taxonomy
 * Every error a request can end with is one of these kinds. The kind pins the
 * status and error code unless a DomainRule failure overrides them.
 */

import { MessageKey, describeMessage } from './messageKeys.js';

export enum FailureKind {
    Validation = 'Validation',
    NotFound = 'NotFound',
    Unauthorized = 'Unauthorized',
    Forbidden = 'Forbidden',
    DomainRule = 'DomainRule',
    Infrastructure = 'Infrastructure',
}

export type FieldErrors = Readonly<Record<string, readonly string[]>>;

interface FailureInit {
    kind: FailureKind;
    httpStatus: number;
    errorCode: string;
    messageKey: MessageKey;
    humanMessage: string;
    fieldErrors?: FieldErrors;
    cause?: unknown;
    context?: string;
}

export class Failure extends Error {
    readonly kind: FailureKind;
    readonly httpStatus: number;
    readonly errorCode: string;
    readonly messageKey: MessageKey;
    readonly humanMessage: string;
    readonly fieldErrors: FieldErrors;
    /** Operation label used in logs only. */
    readonly context?: string;

    constructor(init: FailureInit) {
        super(init.humanMessage, init.cause === undefined ? undefined : { cause: init.cause });
        this.name = 'Failure';
        this.kind = init.kind;
        this.httpStatus = init.httpStatus;
        this.errorCode = init.errorCode;
        this.messageKey = init.messageKey;
        this.humanMessage = init.humanMessage;
        this.fieldErrors = freezeFieldErrors(init.fieldErrors ?? {});
        this.context = init.context;
        Object.freeze(this);
    }
}

export function isFailure(value: unknown): value is Failure {
    return value instanceof Failure;
}

export const INTERNAL_ERROR_CODE = 'INTERNAL_SERVER_ERROR';

const STATUS_CODE_NAMES: Readonly<Record<number, string>> = {
    400: 'BAD_REQUEST',
    401: 'UNAUTHORIZED',
    403: 'FORBIDDEN',
    404: 'NOT_FOUND',
    409: 'CONFLICT',
    410: 'GONE',
    412: 'PRECONDITION_FAILED',
    413: 'PAYLOAD_TOO_LARGE',
    422: 'UNPROCESSABLE_ENTITY',
    429: 'TOO_MANY_REQUESTS',
    500: INTERNAL_ERROR_CODE,
    502: 'BAD_GATEWAY',
    503: 'SERVICE_UNAVAILABLE',
    504: 'GATEWAY_TIMEOUT',
};

/**
 * Error code for a status when the caller did not name one.
 */
export function errorCodeForStatus(status: number): string {
    return STATUS_CODE_NAMES[status] ?? `HTTP_${status}`;
}

function freezeFieldErrors(fieldErrors: FieldErrors): FieldErrors {
    const copy: Record<string, readonly string[]> = {};
    for (const [field, messages] of Object.entries(fieldErrors)) {
        copy[field] = Object.freeze([...messages]);
    }
    return Object.freeze(copy);
}

export const Failures = {
    /**
     * Callers are expected to have collected at least one field error;
     * `FieldErrorCollector` never raises an empty one.
     */
    validation(fieldErrors: FieldErrors, humanMessage?: string): Failure {
        return new Failure({
            kind: FailureKind.Validation,
            httpStatus: 400,
            errorCode: 'VALIDATION_ERROR',
            messageKey: MessageKey.ValidationError,
            humanMessage: humanMessage ?? describeMessage(MessageKey.ValidationError),
            fieldErrors,
        });
    },

    notFound(entityName: string, key: unknown, messageKey: MessageKey = MessageKey.NotFound): Failure {
        return new Failure({
            kind: FailureKind.NotFound,
            httpStatus: 404,
            errorCode: 'NOT_FOUND',
            messageKey,
            humanMessage: `${entityName} with key '${String(key)}' does not exist.`,
        });
    },

    unauthorized(reason?: string): Failure {
        return new Failure({
            kind: FailureKind.Unauthorized,
            httpStatus: 401,
            errorCode: 'UNAUTHORIZED',
            messageKey: MessageKey.Unauthorized,
            humanMessage: reason ?? describeMessage(MessageKey.Unauthorized),
        });
    },

    forbidden(reason?: string): Failure {
        return new Failure({
            kind: FailureKind.Forbidden,
            httpStatus: 403,
            errorCode: 'FORBIDDEN',
            messageKey: MessageKey.Forbidden,
            humanMessage: reason ?? describeMessage(MessageKey.Forbidden),
        });
    },

    domainRule(
        messageKey: MessageKey,
        humanMessage: string,
        overrideStatus?: number,
        overrideCode?: string
    ): Failure {
        const httpStatus = overrideStatus ?? 400;
        return new Failure({
            kind: FailureKind.DomainRule,
            httpStatus,
            errorCode: overrideCode ?? errorCodeForStatus(httpStatus),
            messageKey,
            humanMessage,
        });
    },

    /**
     * The cause stays on the failure for operators; callers only ever see the
     * fixed message.
     */
    infrastructure(cause: unknown, context?: string): Failure {
        return new Failure({
            kind: FailureKind.Infrastructure,
            httpStatus: 500,
            errorCode: INTERNAL_ERROR_CODE,
            messageKey: MessageKey.InternalServerError,
            humanMessage: describeMessage(MessageKey.InternalServerError),
            cause,
            context,
        });
    },
};
