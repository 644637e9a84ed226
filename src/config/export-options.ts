import * as path from 'path';
import { ValidationError } from '../errors/index.js';
import { exportOptionsSchema } from '../types/config.types.js';
import type { ExportOptions, ResolvedExportOptions } from '../types/config.types.js';
import { FilenameTemplate } from '../utils/filename-template.js';

/**
 * Default output directory: the PDF path with its extension removed
 */
export function defaultOutputDir(pdfPath: string): string {
    const { dir, name } = path.parse(pdfPath);
    return path.join(dir, name);
}

/**
 * Validate export options once and apply defaults
 *
 * Every argument check happens here, before any file is touched.
 *
 * @throws ValidationError naming the first offending field
 */
export function resolveExportOptions(options: ExportOptions): ResolvedExportOptions {
    const validation = exportOptionsSchema.safeParse(options);

    if (!validation.success) {
        const [issue] = validation.error.issues;
        throw new ValidationError(issue?.message ?? 'Invalid export options', issue?.path.join('.'), {
            issues: validation.error.issues,
        });
    }

    const validated = validation.data;
    const pdfPath = path.resolve(validated.pdfPath);

    return {
        pdfPath,
        stem: path.parse(pdfPath).name,
        outputDir: path.resolve(validated.outputDir ?? defaultOutputDir(pdfPath)),
        dpi: validated.dpi,
        quality: validated.quality,
        format: validated.format,
        startPage: validated.startPage,
        endPage: validated.endPage,
        overwrite: validated.overwrite,
        filenameTemplate: FilenameTemplate.parse(validated.filenameTemplate),
        password: validated.password,
        grayscale: validated.grayscale,
        maxDimension: validated.maxDimension,
    };
}
