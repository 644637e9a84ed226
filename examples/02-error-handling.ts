/**
 * 02 - Error Handling
 *
 * Every failure is a PdfImageExportError subclass with a stable `code`
 * and the correlation ID of the run that raised it.
 *
 * Run: npx tsx examples/02-error-handling.ts path/to/encrypted.pdf [password]
 */

import {
    createPdfImageExporter,
    InterruptedError,
    NotFoundError,
    PdfImageExportError,
    PermissionDeniedError,
    ValidationError,
} from '../src/index.js';

async function main(): Promise<void> {
    const [pdfPath = 'missing.pdf', password] = process.argv.slice(2);
    const exporter = createPdfImageExporter({ logging: { level: 'error' } });

    console.log('pdf-page-images Error Handling Example\n');
    console.log('='.repeat(50));

    // 1. Validation runs before the PDF is touched
    try {
        await exporter.export({ pdfPath, format: 'jpg', quality: 150 });
    } catch (error) {
        if (error instanceof ValidationError) {
            console.log(`\n1. ValidationError on '${error.field}': ${error.message}`);
        }
    }

    // 2. Missing input, encrypted input, interruption
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 2000);

    try {
        const result = await exporter.export({ pdfPath, password }, { signal: controller.signal });
        console.log(`\n2. Exported ${result.written.length} pages to ${result.outputDir}`);
    } catch (error) {
        if (error instanceof NotFoundError) {
            console.log(`\n2. Not found: ${error.resourceId}`);
        } else if (error instanceof PermissionDeniedError) {
            console.log(`\n2. ${error.code}: ${error.message}`);
        } else if (error instanceof InterruptedError) {
            console.log(`\n2. Stopped after ${error.pagesCompleted} pages`);
        } else if (error instanceof PdfImageExportError) {
            console.log('\n2. Export failed:', JSON.stringify(error.toJSON(), null, 2));
        } else {
            throw error;
        }
    }

    console.log('='.repeat(50));
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
