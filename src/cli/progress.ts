/**
 * Single-line page progress for the CLI
 *
 * Drawn on stderr only when it is a terminal; piped output stays clean.
 */

import type { ExportEventEmitter, ExportEvents } from '../utils/events.js';
import { pageRangeSize } from '../utils/page-range.js';

// ANSI escape codes
const ESC = '\x1b';
const CLEAR_LINE = `${ESC}[2K`;
const DIM = `${ESC}[2m`;
const RESET = `${ESC}[0m`;
const GREEN = `${ESC}[32m`;

const BAR_WIDTH = 30;

export interface ProgressStream {
    write(chunk: string): boolean;
    isTTY?: boolean;
}

export class PageProgress {
    private total = 0;
    private done = 0;
    private skipped = 0;
    private active = false;

    constructor(private readonly stream: ProgressStream) {}

    get enabled(): boolean {
        return this.stream.isTTY === true;
    }

    /**
     * Subscribe to an exporter's events
     * @returns A function that removes the listeners
     */
    attach(events: ExportEventEmitter): () => void {
        if (!this.enabled) {
            return () => undefined;
        }

        const onStart = (data: ExportEvents['export:start']): void => this.start(pageRangeSize(data.range));
        const onWritten = (): void => this.advance(false);
        const onSkipped = (): void => this.advance(true);
        const onEnd = (): void => this.finish();

        events.on('export:start', onStart);
        events.on('page:written', onWritten);
        events.on('page:skipped', onSkipped);
        events.on('export:complete', onEnd);
        events.on('export:error', onEnd);

        return () => {
            events.off('export:start', onStart);
            events.off('page:written', onWritten);
            events.off('page:skipped', onSkipped);
            events.off('export:complete', onEnd);
            events.off('export:error', onEnd);
        };
    }

    start(total: number): void {
        this.total = total;
        this.done = 0;
        this.skipped = 0;
        this.active = true;
        this.render();
    }

    advance(skipped: boolean): void {
        this.done++;
        if (skipped) {
            this.skipped++;
        }
        this.render();
    }

    /**
     * Sink for log lines that keeps the bar on the last line: the bar is
     * cleared, the line written, and the bar drawn again below it
     */
    createLogStream(): { write(chunk: string): void } {
        return {
            write: (chunk: string): void => {
                if (this.active) {
                    this.stream.write(`\r${CLEAR_LINE}`);
                }
                this.stream.write(chunk);
                this.render();
            },
        };
    }

    /**
     * End the line so later output starts on a fresh one
     */
    finish(): void {
        if (!this.active) {
            return;
        }
        this.active = false;
        this.stream.write('\n');
    }

    private render(): void {
        if (!this.active) {
            return;
        }
        const filled = Math.round((this.done / Math.max(this.total, 1)) * BAR_WIDTH);
        const bar = `${GREEN}${'█'.repeat(filled)}${RESET}${DIM}${'░'.repeat(BAR_WIDTH - filled)}${RESET}`;
        const skippedNote = this.skipped > 0 ? `  ${DIM}(${this.skipped} skipped)${RESET}` : '';
        this.stream.write(`\r${CLEAR_LINE}Rendering pages  ${bar}  ${this.done}/${this.total}${skippedNote}`);
    }
}
