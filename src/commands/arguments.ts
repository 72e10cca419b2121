/**
 * Split a raw argument string into positional arguments.
 *
 * Whitespace separates arguments; single and double quotes group them;
 * a backslash escapes the next character outside single quotes. An
 * unterminated quote runs to the end of the input.
 */
export function splitArguments(raw: string): string[] {
    const args: string[] = [];
    let current = '';
    let inToken = false;
    let quote: '"' | "'" | null = null;

    for (let i = 0; i < raw.length; i++) {
        const ch = raw[i];

        if (quote) {
            if (ch === quote) {
                quote = null;
            } else if (ch === '\\' && quote === '"' && i + 1 < raw.length) {
                current += raw[++i];
            } else {
                current += ch;
            }
            continue;
        }

        if (ch === '"' || ch === "'") {
            quote = ch;
            inToken = true;
        } else if (ch === '\\' && i + 1 < raw.length) {
            current += raw[++i];
            inToken = true;
        } else if (/\s/.test(ch)) {
            if (inToken) {
                args.push(current);
                current = '';
                inToken = false;
            }
        } else {
            current += ch;
            inToken = true;
        }
    }

    if (inToken) args.push(current);
    return args;
}

/**
 * Join arguments back into a raw string that `splitArguments` reads the
 * same way
 */
export function joinArguments(args: string[]): string {
    return args
        .map((arg) => (arg === '' || /[\s"'\\]/.test(arg) ? `"${arg.replace(/["\\]/g, '\\$&')}"` : arg))
        .join(' ');
}
