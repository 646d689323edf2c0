// src/stateMachine/AbstractStateMachine.ts

import type { ILogger, IProgressBar } from '../@types/index.js';

interface IStateMachineOptions {
    logger: ILogger;
    verbose: boolean;
    progressBar?: IProgressBar;
}

export abstract class AbstractStateMachine<S, O extends IStateMachineOptions> {
    protected state: S;
    protected readonly options: O;
    protected stateTransitions: Array<{ state: S; handler: () => Promise<void> | void }>;

    protected constructor(initialState: S, options: O) {
        this.state = initialState;
        this.options = options;
        this.stateTransitions = [];
    }

    get currentState(): S {
        return this.state;
    }

    /**
     * Runs every handler in `stateTransitions` order, then moves to the completion state.
     *
     * @throws The error raised by the failing handler, after the machine moved to its error state.
     */
    async run(): Promise<void> {
        try {
            for (const transition of this.stateTransitions) {
                this.transitionTo(transition.state);
                await transition.handler.call(this);
            }
            this.options.progressBar?.increment({ state: 'COMPLETE' });
            this.transitionTo(this.getCompletionState());
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            this.transitionTo(this.getErrorState(), failure);
            this.handleError(failure);
        }
    }

    /**
     * Moves to `nextState` and ticks the progress bar. Entering the error state with an
     * error only records the failure; the progress bar is left alone.
     */
    protected transitionTo(nextState: S, error?: Error): void {
        const { logger } = this.options;
        if (nextState === this.getErrorState() && error) {
            logger.debug(`Error occurred during "${String(this.state)}": ${error.message}`);
            this.state = this.getErrorState();
        } else {
            if (this.options.verbose) {
                logger.debug(`STATE :: Transitioning from state "${String(this.state)}" -> "${String(nextState)}"`);
            }
            this.options.progressBar?.increment({ state: nextState });
            this.state = nextState;
        }
    }

    // Logs, then re-throws so the caller can attribute the failure to its input.
    protected handleError(error: Error): never {
        const { logger } = this.options;
        logger.error(`${String(this.getErrorState())} :: ${error.message}`);
        throw error;
    }

    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
}
