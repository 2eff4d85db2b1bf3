import { Failures } from './failure.js';
import type { Failure, FieldErrors } from './failure.js';

/**
 * Accumulates field-level messages so that every broken rule is reported in
 * a single Validation failure.
 */
export class FieldErrorCollector {
    private readonly errors = new Map<string, string[]>();

    add(field: string, message: string): this {
        const messages = this.errors.get(field);
        if (messages) {
            messages.push(message);
        } else {
            this.errors.set(field, [message]);
        }
        return this;
    }

    merge(fieldErrors: FieldErrors): this {
        for (const [field, messages] of Object.entries(fieldErrors)) {
            for (const message of messages) {
                this.add(field, message);
            }
        }
        return this;
    }

    get hasErrors(): boolean {
        return this.errors.size > 0;
    }

    toFieldErrors(): FieldErrors {
        return Object.fromEntries(this.errors);
    }

    toFailure(): Failure {
        return Failures.validation(this.toFieldErrors());
    }

    throwIfAny(): void {
        if (this.hasErrors) {
            throw this.toFailure();
        }
    }
}
