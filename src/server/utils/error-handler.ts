/**
 * Unified error handling tool
 * Runs request handlers with a fallback result and per-operation error accounting
 */

export interface Logger {
    error(message: string): void;
}

export interface ErrorContext {
    operation: string;
    documentUri?: string;
    additional?: Record<string, unknown>;
}

export interface ErrorHandlerOptions<T> {
    logToConsole: boolean;
    showToUser: boolean;
    fallbackValue: T;
}

export type HandlerOptions<T> = Partial<ErrorHandlerOptions<T>> & { fallbackValue: T };

export class ErrorHandler {
    private errorCounts: Map<string, number> = new Map();
    private readonly maxErrorsBeforeDisable = 10;
    private disabledFeatures: Set<string> = new Set();

    constructor(
        private readonly logger: Logger,
        private readonly notifyUser?: (message: string) => void
    ) {}

    /**
     * Handle errors and return fallback result
     */
    public async handleAsync<T>(
        operation: string,
        fn: () => Promise<T>,
        options: HandlerOptions<T>,
        context: Partial<ErrorContext> = {}
    ): Promise<T> {
        const opts = this.withDefaults(options);
        if (this.isFeatureDisabled(operation)) {
            return opts.fallbackValue;
        }

        try {
            return await fn();
        } catch (error) {
            this.handleError(operation, error, context, opts);
            return opts.fallbackValue;
        }
    }

    public isFeatureDisabled(feature: string): boolean {
        return this.disabledFeatures.has(feature);
    }

    private withDefaults<T>(options: HandlerOptions<T>): ErrorHandlerOptions<T> {
        return {
            logToConsole: true,
            showToUser: false,
            ...options
        };
    }

    private handleError<T>(
        operation: string,
        error: unknown,
        context: Partial<ErrorContext>,
        options: ErrorHandlerOptions<T>
    ): void {
        const errorCount = (this.errorCounts.get(operation) || 0) + 1;
        this.errorCounts.set(operation, errorCount);

        // Too many errors: disable the operation for the rest of the session
        if (errorCount >= this.maxErrorsBeforeDisable) {
            this.disabledFeatures.add(operation);
            this.logger.error(
                `Feature "${operation}" disabled due to too many errors (${errorCount}). ` +
                `Restart the language server to re-enable.`
            );
            return;
        }

        const errorMessage = this.formatErrorMessage(error, {
            ...context,
            operation,
            additional: {
                errorCount,
                ...context.additional
            }
        });

        if (options.logToConsole) {
            this.logger.error(errorMessage);
        }

        if (options.showToUser && this.notifyUser) {
            this.notifyUser(`Hack outline error in ${operation}: ${messageOf(error)}`);
        }
    }

    private formatErrorMessage(error: unknown, context: ErrorContext): string {
        const parts: string[] = [];

        parts.push(`[${context.operation}]`);

        if (context.documentUri) {
            parts.push(`Document: ${context.documentUri}`);
        }

        parts.push(`Error: ${messageOf(error)}`);
        parts.push(`Stack: ${error instanceof Error && error.stack ? error.stack : 'No stack trace'}`);

        if (context.additional) {
            parts.push(`Context: ${JSON.stringify(context.additional)}`);
        }

        return parts.join(' | ');
    }
}

function messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
