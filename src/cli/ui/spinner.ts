import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Spinner wrapper for the load phase of long commands. Disabled spinners
 * do nothing, so callers need not check for JSON output or a non-TTY.
 */
export class Spinner {
    private spinner: Ora | null;

    constructor(enabled = Boolean(process.stderr.isTTY)) {
        this.spinner = enabled
            ? ora({ color: 'cyan', spinner: 'dots', stream: process.stderr })
            : null;
    }

    start(message: string): void {
        this.spinner?.start(chalk.dim(message));
    }

    update(message: string): void {
        if (this.spinner) this.spinner.text = chalk.dim(message);
    }

    /**
     * Stop the spinner (no status icon)
     */
    stop(): void {
        this.spinner?.stop();
    }
}
