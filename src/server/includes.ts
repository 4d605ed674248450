/**
 * Server-side include expansion.
 *
 * Replaces `<!-- #include virtual="path" -->` directives in an HTML
 * document with the contents of the referenced file. Only this literal
 * form is recognised; there are no SSI expressions, conditionals or
 * variables.
 *
 * Expansion is a single pass: included text is inserted verbatim and never
 * scanned for directives of its own, so circular includes cannot loop.
 *
 * @packageDocumentation
 */

import { join } from 'path';
import type { ExpansionResult, IncludeResult } from '../types.js';
import { unquote } from '../utils.js';
import { fileExists, readUtf8File } from './loader.js';

/**
 * Matches one include directive. Group 1 is the still-encoded target.
 */
const INCLUDE_PATTERN = /<!--\s*#include\s+virtual="([^"]+)"\s*-->/g;

interface ResolvedInclude extends IncludeResult {
    replacement: string;
}

/**
 * Builds the comment that replaces a directive whose target is absent.
 */
export function missingIncludeComment(path: string): string {
    return `<!-- File not found: ${path} -->`;
}

/**
 * Builds the comment that replaces a directive whose target failed to read.
 */
export function includeErrorComment(path: string, message: string): string {
    return `<!-- Error including ${path}: ${message} -->`;
}

async function resolveInclude(
    directive: string,
    target: string,
    baseDir: string,
): Promise<ResolvedInclude> {
    // A leading slash stays relative to baseDir
    const path = join(baseDir, unquote(target));

    if (!(await fileExists(path))) {
        return {
            directive,
            path,
            status: 'missing',
            replacement: missingIncludeComment(path),
        };
    }

    try {
        const content = await readUtf8File(path);
        return { directive, path, status: 'included', replacement: content };
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return {
            directive,
            path,
            status: 'error',
            error: message,
            replacement: includeErrorComment(path, message),
        };
    }
}

/**
 * Expands include directives and reports what happened to each one.
 *
 * Directives are resolved left to right against `baseDir`. A missing
 * target or a target that is not a regular file becomes a
 * `<!-- File not found: ... -->` comment; a read or UTF-8 decoding failure
 * becomes `<!-- Error including ...: ... -->`. Text outside directives is
 * left untouched.
 *
 * @param html - Document text
 * @param baseDir - Directory of the document, used to resolve targets
 * @returns The expanded text and one report per directive
 */
export async function expandIncludesDetailed(
    html: string,
    baseDir: string,
): Promise<ExpansionResult> {
    const resolved: ResolvedInclude[] = [];
    for (const match of html.matchAll(INCLUDE_PATTERN)) {
        resolved.push(await resolveInclude(match[0], match[1], baseDir));
    }

    if (resolved.length === 0) {
        return { content: html, includes: [] };
    }

    let next = 0;
    const content = html.replace(
        INCLUDE_PATTERN,
        () => resolved[next++].replacement,
    );

    return {
        content,
        includes: resolved.map(({ replacement: _replacement, ...result }) => result),
    };
}

/**
 * Expands include directives in an HTML document.
 *
 * @param html - Document text
 * @param baseDir - Directory of the document, used to resolve targets
 * @returns The expanded document
 *
 * @example
 * ```typescript
 * // nav.html contains "<nav>Home</nav>"
 * await expandIncludes('<body><!-- #include virtual="nav.html" --></body>', '/srv/app');
 * // Returns: '<body><nav>Home</nav></body>'
 * ```
 */
export async function expandIncludes(
    html: string,
    baseDir: string,
): Promise<string> {
    const { content } = await expandIncludesDetailed(html, baseDir);
    return content;
}
