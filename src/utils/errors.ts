/**
 * Error types raised by the generator.
 * Simulated "Error" cycles are records, not exceptions.
 */

export class GeneratorError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly context?: Record<string, unknown>,
    ) {
        super(message);
        this.name = 'GeneratorError';
    }
}

export class ConfigurationError extends GeneratorError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONFIGURATION_ERROR', context);
        this.name = 'ConfigurationError';
    }
}

export class SimulationError extends GeneratorError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'SIMULATION_ERROR', context);
        this.name = 'SimulationError';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return `${error.name}: ${error.message}`;
    return String(error);
}
