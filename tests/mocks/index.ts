/**
 * Mock Index
 *
 * Central export for all test mocks
 */

// Renderer
export {
    FakePdfRenderer,
    FakePdfDocument,
    OPAQUE_RED,
    TRANSPARENT,
    type FakeDocumentOptions,
    type Rgba,
} from './renderer.mock.js';

// Logger
export { createMockLogger, type MockLogger } from './logger.mock.js';

// Fixtures
export {
    TEST_PASSWORD,
    createTestPdf,
    writeTestPdf,
    writePlaceholderPdf,
    createRaster,
    createMockExportOptions,
    listFiles,
    type TestPdfOptions,
} from './fixtures.js';
