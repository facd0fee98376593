// lib/errors.ts
export class AppError extends Error {
    readonly status: number;

    constructor(message: string, status = 500, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.status = status;
    }
}

/** Missing or invalid configuration. Fatal: the server must not start. */
export class StartupError extends AppError {
    constructor(message: string) {
        super(message, 500);
    }
}

export class InputError extends AppError {
    constructor(message: string) {
        super(message, 400);
    }
}

/** The PDF could not be decoded (corrupt, encrypted, not a PDF at all). */
export class ExtractionError extends AppError {
    constructor(message: string, cause?: unknown) {
        super(message, 422, { cause });
    }
}

/** The job-description check came back in a shape we can't trust. Always fails closed. */
export class ClassificationParseError extends AppError {
    constructor(message: string) {
        super(message, 502);
    }
}

export class GenerationError extends AppError {
    constructor(message: string, cause?: unknown) {
        super(message, 502, { cause });
    }
}

export class NotReadyError extends AppError {
    constructor(message: string) {
        super(message, 409);
    }
}

export class SessionBusyError extends AppError {
    constructor() {
        super("Another request is still running for this session. Please wait for it to finish.", 409);
    }
}

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
