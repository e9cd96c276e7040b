/**
 * Shared Error Factory for wordcloud-mcp domain errors.
 *
 * All functions are pure and return the structured MCP error response shape directly,
 * allowing tool handlers to do:
 *   return errors.textFileNotFound(path);
 *
 * Algorithms and I/O helpers throw `new Error(errors.x(...).content[0].text)` instead,
 * and tool handlers wrap the caught message with `domainError`.
 */

/**
 * The standard MCP error response shape for domain errors.
 * Tool handlers return this object. The LLM reads the text and can self-correct.
 * Keep this a type alias: the SDK's CallToolResult has an index signature,
 * which an interface does not satisfy.
 */
export type DomainErrorResponse = {
    isError: true;
    content: Array<{ type: 'text'; text: string }>;
};

/**
 * Base helper to construct a DomainErrorResponse from a message string.
 */
export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

export function invalidArgument(message: string): DomainErrorResponse {
    return domainError(`Invalid argument: ${message}`);
}

/**
 * Message text of a caught value, for wrapping thrown errors in a response.
 */
export function messageOf(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

// ----------------------------------------------------------------------------
// text sources
// ----------------------------------------------------------------------------

export function textSourceRequired(tool: string): DomainErrorResponse {
    return invalidArgument(`${tool} requires either "text" or "path".`);
}

export function conflictingTextSources(tool: string): DomainErrorResponse {
    return invalidArgument(`${tool} accepts "text" or "path", not both.`);
}

export function textFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Text file not found: ${path}`);
}

// ----------------------------------------------------------------------------
// settings
// ----------------------------------------------------------------------------

export function settingsFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Settings file not found: ${path}`);
}

export function invalidSettingsFile(path: string, detail: string): DomainErrorResponse {
    return domainError(`Invalid settings file: ${path}. ${detail}`);
}

export function stopwordsFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Stopword list not found: ${path}`);
}

export function invalidStopwordsFile(path: string, detail: string): DomainErrorResponse {
    return domainError(`Invalid stopword list: ${path}. ${detail}`);
}

// ----------------------------------------------------------------------------
// export
// ----------------------------------------------------------------------------

export function svgOutputRequiresSvgFormat(): DomainErrorResponse {
    return invalidArgument('"output_path" is only supported with format "svg".');
}

export function cannotWritePath(path: string): DomainErrorResponse {
    return domainError(`Cannot write to path: ${path}`);
}
