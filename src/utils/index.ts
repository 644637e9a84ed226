export { createLogger } from './logger.js';
export type { Logger, LogMeta } from './logger.js';

export { ExportEventEmitter, createEventEmitter } from './events.js';
export type { ExportEvents } from './events.js';

export { FilenameTemplate } from './filename-template.js';
export type { TemplateField, TemplateValues } from './filename-template.js';

export { resolvePageRange, pageRangeSize, describePageRange } from './page-range.js';
export type { PageRange } from './page-range.js';
