/**
 * 01 - Basic Usage
 *
 * 1. Create an exporter with createPdfImageExporter()
 * 2. Follow progress through its events
 * 3. Export a page range as PNG
 *
 * Run: npx tsx examples/01-basic-usage.ts path/to/file.pdf
 */

import { createPdfImageExporter, pdfToImages } from '../src/index.js';

async function main(): Promise<void> {
    const pdfPath = process.argv[2];
    if (!pdfPath) {
        console.error('Usage: 01-basic-usage.ts <file.pdf>');
        process.exitCode = 1;
        return;
    }

    console.log('pdf-page-images Basic Usage Example\n');
    console.log('='.repeat(50));

    // 1. One call, all defaults: 300 DPI JPG next to the PDF
    const outDir = await pdfToImages({ pdfPath });
    console.log(`\nDefault export: ${outDir}`);

    // 2. Exporter with events
    const exporter = createPdfImageExporter({
        logging: { level: 'warn', structured: false },
    });

    exporter.events.on('export:start', ({ pageCount, range }) => {
        console.log(`\nExporting pages ${range.first + 1}-${range.last + 1} of ${pageCount}`);
    });
    exporter.events.on('page:written', ({ pageNumber, width, height, bytes }) => {
        console.log(`   Page ${pageNumber}: ${width}x${height}, ${bytes} bytes`);
    });

    // 3. First two pages as grayscale PNG thumbnails
    const result = await exporter.export({
        pdfPath,
        outputDir: `${outDir}-thumbs`,
        format: 'png',
        dpi: 150,
        startPage: 1,
        endPage: 2,
        grayscale: true,
        maxDimension: 400,
        filenameTemplate: 'thumb_{page:02d}',
    });

    console.log(`\nWrote ${result.written.length} files in ${result.durationMs}ms`);
    console.log('='.repeat(50));
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
