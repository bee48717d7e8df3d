import { createHash } from 'node:crypto';

export interface CacheKeyInput {
    prompt: string;
    /** Identifier of the model preference list the request was made with. */
    model: string;
    context?: Readonly<Record<string, string>>;
    scope: string;
}

/** CRLF to LF, trailing whitespace off every line, then trimmed. */
export function normalizePrompt(text: string): string {
    return text
        .replace(/\r\n?/g, '\n')
        .split('\n')
        .map(line => line.replace(/\s+$/, ''))
        .join('\n')
        .trim();
}

export function modelIdentifier(models: readonly string[]): string {
    return models.join('|');
}

export function deriveCacheKey(input: CacheKeyInput): string {
    const context = Object.entries(input.context ?? {}).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const canonical = JSON.stringify({
        prompt: normalizePrompt(input.prompt),
        model: input.model,
        context,
        scope: input.scope,
    });
    return createHash('sha256').update(canonical).digest('hex');
}
