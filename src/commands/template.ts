import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { CommandDefinition } from './types.js';
import { splitArguments } from './arguments.js';
import { permitsShell, shellQuote } from '../tools/permissions.js';
import { RenderError, errorMessage } from '../utils/errors.js';

const execFileAsync = promisify(execFile);

/**
 * Command Template — previews the prompt the host sends for an invocation
 *
 * Supported tokens:
 *   $ARGUMENTS   → the whole argument string
 *   $1 … $9      → positional arguments (missing ones become empty)
 *   !`command`   → shell output, when rendering with `execute`
 *
 * Lines starting with `❯` show a shell transcript; markers on them never run.
 * Arguments spliced into a marker are shell-quoted word by word.
 */

const PLACEHOLDER = /\$ARGUMENTS|\$([1-9])/g;
const SHELL_MARKER = /!`([^`\n]+)`/g;

export interface PlaceholderScan {
    usesArguments: boolean;
    /** Sorted, unique positional indices */
    positional: number[];
    shellCommands: string[];
}

export interface ShellInvocation {
    command: string;
    /** Trimmed stdout, set when the command ran */
    output?: string;
}

export interface RenderResult {
    prompt: string;
    arguments: string[];
    shellCommands: ShellInvocation[];
    /** Whether the raw arguments were appended because the body has no placeholder */
    appendedArguments: boolean;
}

export type ShellExecutor = (command: string, options: { cwd: string; timeoutMs: number }) => Promise<string>;

export interface RenderOptions {
    /** Run shell markers and splice in their output */
    execute?: boolean;
    cwd?: string;
    timeoutMs?: number;
    executor?: ShellExecutor;
}

export function scanPlaceholders(body: string): PlaceholderScan {
    let usesArguments = false;
    const positional = new Set<number>();

    for (const match of body.matchAll(PLACEHOLDER)) {
        if (match[1] === undefined) {
            usesArguments = true;
        } else {
            positional.add(Number(match[1]));
        }
    }

    const shellCommands = shellMarkers(body).map((match) => match[1].trim());

    return {
        usesArguments,
        positional: Array.from(positional).sort((a, b) => a - b),
        shellCommands,
    };
}

function substitute(text: string, raw: string, args: string[]): string {
    return text.replace(PLACEHOLDER, (_token, index: string | undefined) =>
        index === undefined ? raw : (args[Number(index) - 1] ?? '')
    );
}

function substituteQuoted(text: string, args: string[]): string {
    return text.replace(PLACEHOLDER, (_token, index: string | undefined) => {
        if (index === undefined) return args.map(shellQuote).join(' ');
        const arg = args[Number(index) - 1];
        return arg === undefined ? '' : shellQuote(arg);
    });
}

function onTranscriptLine(text: string, offset: number): boolean {
    const lineStart = text.lastIndexOf('\n', offset - 1) + 1;
    return text.slice(lineStart, offset).trimStart().startsWith('❯');
}

function shellMarkers(text: string): RegExpMatchArray[] {
    return Array.from(text.matchAll(SHELL_MARKER)).filter((match) => !onTranscriptLine(text, match.index ?? 0));
}

export const defaultShellExecutor: ShellExecutor = async (command, { cwd, timeoutMs }) => {
    const { stdout } = await execFileAsync('/bin/sh', ['-c', command], {
        cwd,
        timeout: timeoutMs,
        env: { ...process.env },
    });
    return stdout.toString().trim();
};

/**
 * Render a command body for the given raw argument string
 */
export async function renderCommand(
    command: CommandDefinition,
    rawArgs: string,
    options: RenderOptions = {}
): Promise<RenderResult> {
    const raw = rawArgs.trim();
    const args = splitArguments(raw);
    const template = command.prompt;
    const scan = scanPlaceholders(template);

    const shellCommands: ShellInvocation[] = [];
    let prompt = '';
    let cursor = 0;

    // Shell markers are located in the template before substitution so that
    // argument text can never introduce a new marker.
    for (const match of shellMarkers(template)) {
        const start = match.index ?? 0;
        prompt += substitute(template.slice(cursor, start), raw, args);
        cursor = start + match[0].length;

        const shellCommand = substituteQuoted(match[1], args).trim();
        if (!options.execute) {
            shellCommands.push({ command: shellCommand });
            prompt += `!\`${shellCommand}\``;
            continue;
        }

        if (!permitsShell(command.allowedTools, shellCommand)) {
            throw new RenderError(
                `Shell command not permitted by allowed-tools of "${command.id}": ${shellCommand}`,
                shellCommand
            );
        }

        const executor = options.executor ?? defaultShellExecutor;
        let output: string;
        try {
            output = await executor(shellCommand, {
                cwd: options.cwd ?? process.cwd(),
                timeoutMs: options.timeoutMs ?? 10_000,
            });
        } catch (err) {
            throw new RenderError(`Shell command failed: ${shellCommand}: ${errorMessage(err)}`, shellCommand);
        }

        shellCommands.push({ command: shellCommand, output });
        prompt += output;
    }
    prompt += substitute(template.slice(cursor), raw, args);

    const hasPlaceholder = scan.usesArguments || scan.positional.length > 0;
    const appendedArguments = !hasPlaceholder && raw !== '';
    if (appendedArguments) {
        prompt += `\n\nARGUMENTS: ${raw}`;
    }

    return { prompt, arguments: args, shellCommands, appendedArguments };
}
