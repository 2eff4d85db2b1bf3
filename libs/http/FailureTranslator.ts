/**
 * Failure Translator
 *
 * The single place where a thrown value becomes a response envelope and a log
 * record. Classified failures keep their status, code and message; anything
 * else becomes the fixed internal-error envelope. Internal detail (causes,
 * stacks, SQL) is only ever logged, never returned.
 */

import { Failure, FailureKind, INTERNAL_ERROR_CODE, isFailure } from '../errors/failure.js';
import type { FieldErrors } from '../errors/failure.js';
import { MessageKey, describeMessage } from '../errors/messageKeys.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { getRequestLogger, logger as defaultLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { failureEnvelope } from './envelope.js';
import type { ResponseEnvelope } from './envelope.js';

export type FailureLogLevel = 'warn' | 'error';

export interface FailureLogRecord {
    readonly level: FailureLogLevel;
    readonly message: string;
    readonly context: Record<string, unknown>;
}

export interface Translation {
    readonly envelope: ResponseEnvelope<FieldErrors>;
    readonly logRecord: FailureLogRecord;
}

export interface FailureTranslatorOptions {
    logger?: Logger;
    now?: () => Date;
}

function assertNever(kind: never): never {
    throw new Error(`Unhandled failure kind: ${String(kind)}`);
}

export class FailureTranslator {
    private readonly logger: Logger;
    private readonly now: () => Date;

    constructor(options: FailureTranslatorOptions = {}) {
        this.logger = options.logger ?? defaultLogger;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Builds the envelope and emits the log record. Never throws.
     */
    translate(error: unknown): Translation {
        const translation = this.classify(error);
        const log = getRequestLogger(this.logger);
        if (translation.logRecord.level === 'warn') {
            log.warn(translation.logRecord.context, translation.logRecord.message);
        } else {
            log.error(translation.logRecord.context, translation.logRecord.message);
        }
        return translation;
    }

    private classify(error: unknown): Translation {
        if (!isFailure(error)) {
            return this.internal(error, undefined);
        }

        switch (error.kind) {
            case FailureKind.Validation:
                return {
                    envelope: this.envelopeFor(error, error.fieldErrors),
                    logRecord: {
                        level: 'warn',
                        message: 'Validation failed',
                        context: {
                            kind: error.kind,
                            errorCode: error.errorCode,
                            messageKey: error.messageKey,
                            humanMessage: error.humanMessage,
                            fields: Object.fromEntries(
                                Object.entries(error.fieldErrors).map(([field, messages]) => [field, messages.length])
                            )
                        }
                    }
                };
            case FailureKind.NotFound:
            case FailureKind.Unauthorized:
            case FailureKind.Forbidden:
            case FailureKind.DomainRule:
                return {
                    envelope: this.envelopeFor(error, null),
                    logRecord: {
                        level: 'warn',
                        message: error.humanMessage,
                        context: {
                            kind: error.kind,
                            errorCode: error.errorCode,
                            messageKey: error.messageKey
                        }
                    }
                };
            case FailureKind.Infrastructure:
                return this.internal(error.cause, error.context);
            default:
                return assertNever(error.kind);
        }
    }

    private envelopeFor(failure: Failure, data: FieldErrors | null): ResponseEnvelope<FieldErrors> {
        return failureEnvelope({
            messageKey: failure.messageKey,
            message: failure.humanMessage,
            errorCode: failure.errorCode,
            statusCode: failure.httpStatus,
            data,
            timestamp: this.now()
        });
    }

    private internal(cause: unknown, context: string | undefined): Translation {
        return {
            envelope: failureEnvelope<FieldErrors>({
                messageKey: MessageKey.InternalServerError,
                message: describeMessage(MessageKey.InternalServerError),
                errorCode: INTERNAL_ERROR_CODE,
                statusCode: 500,
                data: null,
                timestamp: this.now()
            }),
            logRecord: {
                level: 'error',
                message: 'Unhandled failure',
                context: {
                    kind: FailureKind.Infrastructure,
                    operation: context,
                    err: cause instanceof Error ? cause : ErrorSanitizer.describe(cause)
                }
            }
        };
    }
}
