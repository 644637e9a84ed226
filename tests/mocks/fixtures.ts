/**
 * Test Fixtures
 *
 * Real PDFs built in memory with mupdf, and raw rasters for codec tests.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as mupdf from 'mupdf';
import { channelsOf, type RasterImage } from '../../src/types/raster.types.js';
import type { ColorMode } from '../../src/types/enums.js';
import type { ExportOptions } from '../../src/types/config.types.js';

export const TEST_PASSWORD = 'test-secret';

export interface TestPdfOptions {
    pageCount?: number;
    /** Page size in PDF units */
    width?: number;
    height?: number;
    /** Encrypt with TEST_PASSWORD as user and owner password */
    encrypted?: boolean;
}

/**
 * Build a PDF whose pages each carry one filled rectangle over an
 * otherwise empty (transparent) page
 */
export function createTestPdf(options: TestPdfOptions = {}): Buffer {
    const { pageCount = 3, width = 144, height = 72, encrypted = false } = options;
    const doc = new mupdf.PDFDocument();

    for (let i = 0; i < pageCount; i++) {
        const shade = (i % 3) / 3;
        const content = `q\n${shade} 0.2 0.6 rg\n10 10 ${width / 2} ${height / 2} re f\nQ\n`;
        doc.insertPage(-1, doc.addPage([0, 0, width, height], 0, doc.newDictionary(), content));
    }

    const saveOptions = encrypted
        ? `encrypt=aes-256,user-password=${TEST_PASSWORD},owner-password=${TEST_PASSWORD}`
        : '';
    return Buffer.from(doc.saveToBuffer(saveOptions).asUint8Array());
}

/**
 * Write a test PDF into `dir`
 * @returns Absolute path of the written file
 */
export async function writeTestPdf(dir: string, fileName = 'sample.pdf', options: TestPdfOptions = {}): Promise<string> {
    const pdfPath = path.join(dir, fileName);
    await fs.writeFile(pdfPath, createTestPdf(options));
    return pdfPath;
}

/**
 * Write a file that only has to exist, for runs against the fake renderer
 */
export async function writePlaceholderPdf(dir: string, fileName = 'doc.pdf'): Promise<string> {
    const pdfPath = path.join(dir, fileName);
    await fs.writeFile(pdfPath, '%PDF-1.4 placeholder');
    return pdfPath;
}

/**
 * Solid-color raster
 * @param pixel - One value per channel of `mode`
 */
export function createRaster(width: number, height: number, mode: ColorMode, pixel: readonly number[]): RasterImage {
    const channels = channelsOf(mode);
    const data = Buffer.alloc(width * height * channels);
    for (let offset = 0; offset < data.length; offset += channels) {
        data.set(pixel.slice(0, channels), offset);
    }
    return { data, width, height, mode };
}

export function createMockExportOptions(overrides: Partial<ExportOptions> = {}): ExportOptions {
    return {
        pdfPath: '/tmp/docs/report.pdf',
        ...overrides,
    };
}

/**
 * Sorted file names in a directory
 */
export async function listFiles(dir: string): Promise<string[]> {
    return (await fs.readdir(dir)).sort();
}
