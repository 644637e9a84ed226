/**
 * Error context for correlation and tracing
 */
export interface ErrorContext {
    /** Correlation ID of the export run */
    correlationId?: string;
    /** Timestamp when error occurred */
    timestamp?: Date;
    /** Original cause of the error */
    cause?: Error;
    /** Operation that was being performed */
    operation?: string;
}

/**
 * Generate a unique correlation ID
 */
export function generateCorrelationId(): string {
    return `p2i_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Correlation ID of the export currently running in this process
 */
let currentCorrelationId: string | undefined;

export function setCorrelationId(id: string): void {
    currentCorrelationId = id;
}

export function getCorrelationId(): string {
    return currentCorrelationId ?? generateCorrelationId();
}

export function clearCorrelationId(): void {
    currentCorrelationId = undefined;
}

/**
 * Base error class for the exporter
 * All errors extend this class for consistent handling
 */
export class PdfImageExportError extends Error {
    public readonly code: string;
    public readonly details?: Record<string, unknown>;
    public readonly correlationId: string;
    public readonly timestamp: Date;
    public readonly cause?: Error;
    public readonly operation?: string;

    constructor(
        message: string,
        code: string,
        details?: Record<string, unknown>,
        context?: ErrorContext
    ) {
        super(message);
        this.name = 'PdfImageExportError';
        this.code = code;
        this.details = details;
        this.correlationId = context?.correlationId ?? getCorrelationId();
        this.timestamp = context?.timestamp ?? new Date();
        this.cause = context?.cause;
        this.operation = context?.operation;
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            correlationId: this.correlationId,
            timestamp: this.timestamp.toISOString(),
            operation: this.operation,
            cause: this.cause ? {
                name: this.cause.name,
                message: this.cause.message,
            } : undefined,
        };
    }
}

/**
 * Wrap an unknown error into a PdfImageExportError
 */
export function wrapError(
    error: unknown,
    ErrorClass: new (message: string, details?: Record<string, unknown>) => PdfImageExportError,
    operation?: string
): PdfImageExportError {
    if (error instanceof PdfImageExportError) {
        return error;
    }

    const originalError = error instanceof Error ? error : new Error(String(error));
    const wrapped = new ErrorClass(originalError.message, {
        originalError: originalError.name,
        operation,
    });

    Object.defineProperty(wrapped, 'cause', { value: originalError });
    Object.defineProperty(wrapped, 'operation', { value: operation });

    return wrapped;
}

/**
 * Configuration-related errors (environment)
 */
export class ConfigurationError extends PdfImageExportError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'CONFIGURATION_ERROR', details);
        this.name = 'ConfigurationError';
    }
}

/**
 * Validation errors: bad export options or an empty page range
 */
export class ValidationError extends PdfImageExportError {
    public readonly field?: string;

    constructor(message: string, field?: string, details?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', { field, ...details });
        this.name = 'ValidationError';
        this.field = field;
    }
}

/**
 * Not found errors
 */
export class NotFoundError extends PdfImageExportError {
    public readonly resourceType: string;
    public readonly resourceId: string;

    constructor(resourceType: string, resourceId: string) {
        super(`${resourceType} not found: ${resourceId}`, 'NOT_FOUND', {
            resourceType,
            resourceId,
        });
        this.name = 'NotFoundError';
        this.resourceType = resourceType;
        this.resourceId = resourceId;
    }
}

export type PermissionDeniedReason = 'password_required' | 'incorrect_password';

const PERMISSION_MESSAGES: Record<PermissionDeniedReason, { code: string; message: string }> = {
    password_required: {
        code: 'PASSWORD_REQUIRED',
        message: 'PDF is encrypted. Provide a password.',
    },
    incorrect_password: {
        code: 'INCORRECT_PASSWORD',
        message: 'Incorrect PDF password.',
    },
};

/**
 * Encrypted document could not be unlocked
 */
export class PermissionDeniedError extends PdfImageExportError {
    public readonly reason: PermissionDeniedReason;

    constructor(reason: PermissionDeniedReason, filename?: string) {
        const { code, message } = PERMISSION_MESSAGES[reason];
        super(message, code, { reason, filename });
        this.name = 'PermissionDeniedError';
        this.reason = reason;
    }
}

/**
 * PDF processing errors (opening or rendering in the engine)
 */
export class PDFProcessingError extends PdfImageExportError {
    public readonly filename?: string;

    constructor(message: string, filename?: string, details?: Record<string, unknown>) {
        super(message, 'PDF_PROCESSING_ERROR', { filename, ...details });
        this.name = 'PDFProcessingError';
        this.filename = filename;
    }
}

/**
 * Codec failures while transforming or encoding a page image
 */
export class ImageProcessingError extends PdfImageExportError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'IMAGE_PROCESSING_ERROR', details);
        this.name = 'ImageProcessingError';
    }
}

/**
 * Export stopped by its abort signal
 */
export class InterruptedError extends PdfImageExportError {
    public readonly pagesCompleted: number;

    constructor(pagesCompleted: number) {
        super('Export interrupted', 'INTERRUPTED', { pagesCompleted });
        this.name = 'InterruptedError';
        this.pagesCompleted = pagesCompleted;
    }
}
