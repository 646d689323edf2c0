import type { ILogger } from '../../src/@types/index.js';

export class MockLogger implements ILogger {
    infoMessages: string[] = [];
    debugMessages: string[] = [];
    warnMessages: string[] = [];
    errorMessages: string[] = [];
    successMessages: string[] = [];
    verbose: boolean;

    constructor(verbose: boolean = false) {
        this.verbose = verbose;
    }

    info(message: string): void {
        this.infoMessages.push(message);
    }
    success(message: string): void {
        this.successMessages.push(message);
    }
    warn(message: string): void {
        this.warnMessages.push(message);
    }
    error(message: string): void {
        this.errorMessages.push(message);
    }
    debug(message: string): void {
        this.debugMessages.push(message);
    }
}
