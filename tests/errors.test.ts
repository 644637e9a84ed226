import { describe, it, expect } from 'vitest';
import {
    PdfImageExportError,
    ConfigurationError,
    ValidationError,
    NotFoundError,
    PermissionDeniedError,
    PDFProcessingError,
    ImageProcessingError,
    InterruptedError,
    wrapError,
    setCorrelationId,
    getCorrelationId,
    clearCorrelationId,
    generateCorrelationId,
} from '../src/errors/index.js';

describe('Error Classes', () => {
    describe('PdfImageExportError', () => {
        it('should create with message and code', () => {
            const error = new PdfImageExportError('Test error', 'TEST_CODE');
            expect(error.message).toBe('Test error');
            expect(error.code).toBe('TEST_CODE');
            expect(error.name).toBe('PdfImageExportError');
        });

        it('should create with details', () => {
            const error = new PdfImageExportError('Test error', 'TEST', { key: 'value' });
            expect(error.details).toEqual({ key: 'value' });
        });

        it('should take the current correlation ID', () => {
            setCorrelationId('p2i_test');
            const error = new PdfImageExportError('Test error', 'TEST');
            expect(error.correlationId).toBe('p2i_test');
        });

        it('should serialize to JSON', () => {
            const cause = new TypeError('bad input');
            const error = new PdfImageExportError('Test error', 'TEST', { key: 'value' }, {
                correlationId: 'p2i_json',
                cause,
                operation: 'encode',
            });
            const json = error.toJSON();
            expect(json.name).toBe('PdfImageExportError');
            expect(json.code).toBe('TEST');
            expect(json.message).toBe('Test error');
            expect(json.details).toEqual({ key: 'value' });
            expect(json.correlationId).toBe('p2i_json');
            expect(json.operation).toBe('encode');
            expect(json.cause).toEqual({ name: 'TypeError', message: 'bad input' });
        });
    });

    describe('ConfigurationError', () => {
        it('should have correct name and code', () => {
            const error = new ConfigurationError('Invalid config');
            expect(error.name).toBe('ConfigurationError');
            expect(error.code).toBe('CONFIGURATION_ERROR');
        });
    });

    describe('ValidationError', () => {
        it('should store the field', () => {
            const error = new ValidationError('dpi must be > 0.', 'dpi');
            expect(error.code).toBe('VALIDATION_ERROR');
            expect(error.field).toBe('dpi');
            expect(error.details).toEqual({ field: 'dpi' });
        });
    });

    describe('NotFoundError', () => {
        it('should name the missing resource', () => {
            const error = new NotFoundError('PDF', '/tmp/missing.pdf');
            expect(error.message).toBe('PDF not found: /tmp/missing.pdf');
            expect(error.code).toBe('NOT_FOUND');
            expect(error.resourceType).toBe('PDF');
            expect(error.resourceId).toBe('/tmp/missing.pdf');
        });
    });

    describe('PermissionDeniedError', () => {
        it('should report a missing password', () => {
            const error = new PermissionDeniedError('password_required', 'locked.pdf');
            expect(error.message).toBe('PDF is encrypted. Provide a password.');
            expect(error.code).toBe('PASSWORD_REQUIRED');
            expect(error.reason).toBe('password_required');
        });

        it('should report a wrong password', () => {
            const error = new PermissionDeniedError('incorrect_password');
            expect(error.message).toBe('Incorrect PDF password.');
            expect(error.code).toBe('INCORRECT_PASSWORD');
        });
    });

    describe('PDFProcessingError', () => {
        it('should store the filename', () => {
            const error = new PDFProcessingError('Failed to open PDF: not a PDF', 'notes.pdf');
            expect(error.code).toBe('PDF_PROCESSING_ERROR');
            expect(error.filename).toBe('notes.pdf');
        });
    });

    describe('ImageProcessingError', () => {
        it('should have correct name and code', () => {
            const error = new ImageProcessingError('resize failed');
            expect(error.name).toBe('ImageProcessingError');
            expect(error.code).toBe('IMAGE_PROCESSING_ERROR');
        });
    });

    describe('InterruptedError', () => {
        it('should count completed pages', () => {
            const error = new InterruptedError(2);
            expect(error.message).toBe('Export interrupted');
            expect(error.code).toBe('INTERRUPTED');
            expect(error.pagesCompleted).toBe(2);
        });
    });

    describe('inheritance', () => {
        it('should extend PdfImageExportError and Error', () => {
            const errors = [
                new ConfigurationError('x'),
                new ValidationError('x'),
                new NotFoundError('PDF', 'x'),
                new PermissionDeniedError('password_required'),
                new PDFProcessingError('x'),
                new ImageProcessingError('x'),
                new InterruptedError(0),
            ];
            for (const error of errors) {
                expect(error).toBeInstanceOf(PdfImageExportError);
                expect(error).toBeInstanceOf(Error);
            }
        });
    });
});

describe('wrapError', () => {
    it('should return taxonomy errors unchanged', () => {
        const original = new ValidationError('bad');
        expect(wrapError(original, ImageProcessingError, 'encode')).toBe(original);
    });

    it('should wrap plain errors with cause and operation', () => {
        const original = new Error('vips: out of memory');
        const wrapped = wrapError(original, ImageProcessingError, 'resize');

        expect(wrapped).toBeInstanceOf(ImageProcessingError);
        expect(wrapped.message).toBe('vips: out of memory');
        expect(wrapped.cause).toBe(original);
        expect(wrapped.operation).toBe('resize');
        expect(wrapped.details).toEqual({ originalError: 'Error', operation: 'resize' });
    });

    it('should wrap non-Error values', () => {
        const wrapped = wrapError('boom', ImageProcessingError);
        expect(wrapped.message).toBe('boom');
    });
});

describe('correlation IDs', () => {
    it('should generate prefixed IDs', () => {
        expect(generateCorrelationId()).toMatch(/^p2i_\d+_[a-z0-9]+$/);
    });

    it('should generate a fresh ID when none is set', () => {
        clearCorrelationId();
        const first = getCorrelationId();
        const second = getCorrelationId();
        expect(first).not.toBe(second);
    });

    it('should return the ID that was set', () => {
        setCorrelationId('p2i_fixed');
        expect(getCorrelationId()).toBe('p2i_fixed');
        clearCorrelationId();
    });
});
