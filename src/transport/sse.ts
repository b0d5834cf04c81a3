/**
 * Server-sent event encoding
 *
 * @module
 * @internal
 */

export function encodeSseEvent(data: string, event?: string): string {
    const lines = data.split('\n').map(line => `data: ${line}`).join('\n');
    return event === undefined ? `${lines}\n\n` : `event: ${event}\n${lines}\n\n`;
}

export function encodeSseComment(comment: string): string {
    return `: ${comment}\n\n`;
}
