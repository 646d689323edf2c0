// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger } from '../../@types/index.js';

import chalk from 'chalk';

const loggerMap = new Map<string, Logger>();

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

/**
 * Coloured `[LEVEL] name :: message` lines. Debug lines reach the facility only in
 * verbose mode but are recorded either way.
 */
class Logger implements ILogger {
    infoMessages: string[] = [];
    debugMessages: string[] = [];
    warnMessages: string[] = [];
    errorMessages: string[] = [];
    successMessages: string[] = [];

    constructor(
        readonly name: string,
        readonly logger: ILogFacility,
        readonly verbose = false,
    ) {}

    info(message: string) {
        this.logger.log(chalk.blue(`[INFO] ${this.name} :: ${message}`));
        this.infoMessages.push(message);
    }

    success(message: string) {
        this.logger.log(chalk.green(`[SUCCESS] ${this.name} :: ${message}`));
        this.successMessages.push(message);
    }

    warn(message: string) {
        this.logger.warn(chalk.yellow(`[WARNING] ${this.name} :: ${message}`));
        this.warnMessages.push(message);
    }

    error(message: string) {
        this.logger.error(chalk.red(`[ERROR] ${this.name} :: ${message}`));
        this.errorMessages.push(message);
    }

    debug(message: string) {
        if (this.verbose) {
            this.logger.log(chalk.magenta(`[DEBUG] ${this.name} :: ${message}`));
        }
        this.debugMessages.push(message);
    }
}

/**
 * Returns the logger registered under `name`. A call with a different facility or
 * verbosity replaces the registered logger, so a second CLI run in the same process
 * gets the settings it asked for.
 *
 * @param {string} name - Prefix of every line.
 * @param {ILogFacility} [logFacility=console] - Where lines are written.
 * @param {boolean} [verbose=false] - Also write debug lines.
 */
export function getLogger(
    name: string,
    logFacility: ILogFacility = console,
    verbose: boolean = false,
): ILogger {
    const existing = loggerMap.get(name);
    if (existing && existing.logger === logFacility && existing.verbose === verbose) {
        return existing;
    }
    const logger = new Logger(name, logFacility, verbose);
    loggerMap.set(name, logger);
    return logger;
}
