import { ValidationError } from '../errors/index.js';

export type TemplateField = 'stem' | 'page';

export interface TemplateValues {
    /** PDF file name without extension */
    stem: string;
    /** 1-based page number */
    page: number;
}

interface LiteralPart {
    kind: 'literal';
    text: string;
}

interface FieldPart {
    kind: 'field';
    field: TemplateField;
    fill: ' ' | '0';
    width: number;
}

type TemplatePart = LiteralPart | FieldPart;

const PAGE_SPEC = /^(0?)(\d*)d?$/;

/**
 * Compiled output filename pattern
 *
 * Placeholders are `{stem}` and `{page}`. `{page}` takes a width spec:
 * `{page:03d}` zero-pads to three digits, `{page:3d}` space-pads.
 * `{{` and `}}` produce literal braces.
 *
 * @example
 * ```typescript
 * FilenameTemplate.parse('{stem}_p{page:03d}').render({ stem: 'report', page: 7 });
 * // 'report_p007'
 * ```
 */
export class FilenameTemplate {
    private constructor(
        public readonly source: string,
        private readonly parts: readonly TemplatePart[]
    ) {}

    /**
     * @throws ValidationError on unknown placeholders, unbalanced braces or bad specs
     */
    static parse(source: string): FilenameTemplate {
        const parts: TemplatePart[] = [];
        let literal = '';
        let i = 0;

        const flush = (): void => {
            if (literal) {
                parts.push({ kind: 'literal', text: literal });
                literal = '';
            }
        };

        while (i < source.length) {
            const ch = source[i];

            if (ch === '{') {
                if (source[i + 1] === '{') {
                    literal += '{';
                    i += 2;
                    continue;
                }
                const close = source.indexOf('}', i);
                if (close === -1) {
                    throw invalidTemplate(source, `unmatched '{' at position ${i}`);
                }
                flush();
                parts.push(parseField(source, source.slice(i + 1, close)));
                i = close + 1;
                continue;
            }

            if (ch === '}') {
                if (source[i + 1] === '}') {
                    literal += '}';
                    i += 2;
                    continue;
                }
                throw invalidTemplate(source, `single '}' at position ${i}`);
            }

            literal += ch;
            i++;
        }
        flush();

        return new FilenameTemplate(source, parts);
    }

    hasField(field: TemplateField): boolean {
        return this.parts.some((part) => part.kind === 'field' && part.field === field);
    }

    render(values: TemplateValues): string {
        return this.parts
            .map((part) => {
                if (part.kind === 'literal') {
                    return part.text;
                }
                if (part.field === 'stem') {
                    return values.stem;
                }
                return String(values.page).padStart(part.width, part.fill);
            })
            .join('');
    }

    toString(): string {
        return this.source;
    }
}

function parseField(source: string, body: string): FieldPart {
    const colon = body.indexOf(':');
    const name = colon === -1 ? body : body.slice(0, colon);
    const spec = colon === -1 ? '' : body.slice(colon + 1);

    if (name === 'stem') {
        if (spec) {
            throw invalidTemplate(source, `{stem} does not take a format spec ('${spec}')`);
        }
        return { kind: 'field', field: 'stem', fill: ' ', width: 0 };
    }

    if (name === 'page') {
        const match = PAGE_SPEC.exec(spec);
        if (!match) {
            throw invalidTemplate(source, `unsupported format spec '${spec}' for {page}`);
        }
        return {
            kind: 'field',
            field: 'page',
            fill: match[1] === '0' ? '0' : ' ',
            width: match[2] ? Number(match[2]) : 0,
        };
    }

    throw invalidTemplate(source, `unknown placeholder '{${name}}', expected {stem} or {page}`);
}

function invalidTemplate(source: string, reason: string): ValidationError {
    return new ValidationError(`Invalid filename template '${source}': ${reason}.`, 'filenameTemplate', {
        template: source,
    });
}
