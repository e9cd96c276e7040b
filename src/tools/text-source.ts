import * as path from 'node:path';
import { loadTextFile } from '../io/text-io.js';
import * as errors from '../errors.js';

/**
 * Resolves the `text` / `path` argument pair shared by the analysis tools.
 * Exactly one must be given; a path is resolved against the working directory.
 */
export async function resolveText(
    tool: string,
    text: string | undefined,
    filePath: string | undefined,
): Promise<{ text: string } | errors.DomainErrorResponse> {
    if (text !== undefined && filePath !== undefined) {
        return errors.conflictingTextSources(tool);
    }
    if (text !== undefined) {
        return { text };
    }
    if (!filePath) {
        return errors.textSourceRequired(tool);
    }

    try {
        return { text: await loadTextFile(path.resolve(filePath)) };
    } catch (e: unknown) {
        return errors.domainError(errors.messageOf(e));
    }
}
