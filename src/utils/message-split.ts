/**
 * Split text into pieces no longer than `maxChars`, preferring paragraph,
 * then line, then word boundaries. Words longer than the limit are cut.
 */
export function splitMessage(text: string, maxChars: number): string[] {
    const limit = Math.max(1, Math.floor(maxChars));
    const chunks: string[] = [];
    let rest = text.trim();

    while (rest.length > limit) {
        const window = rest.slice(0, limit + 1);
        const cut = [window.lastIndexOf('\n\n'), window.lastIndexOf('\n'), window.lastIndexOf(' ')].find(
            (index) => index > 0,
        );
        const end = cut ?? limit;
        chunks.push(rest.slice(0, end).trimEnd());
        rest = rest.slice(end).trimStart();
    }

    if (rest.length > 0) chunks.push(rest);
    return chunks;
}
