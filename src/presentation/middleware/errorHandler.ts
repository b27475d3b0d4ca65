import { Request, Response, NextFunction } from 'express';

/**
 * Application-specific error with status code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request') {
        super(400, message);
        this.name = 'BadRequestError';
    }
}

/**
 * Error response structure.
 */
export interface ErrorResponse {
    detail: string;
}

/**
 * Raised by express.json() when the request body is not valid JSON.
 */
function isBodyParseError(err: Error): boolean {
    return 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    if (err instanceof NotFoundError || err instanceof BadRequestError) {
        console.warn(`[API] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[API] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    if (err instanceof AppError) {
        const response: ErrorResponse = { detail: err.message };
        res.status(err.statusCode).json(response);
        return;
    }

    if (isBodyParseError(err)) {
        const response: ErrorResponse = { detail: 'Malformed JSON request body' };
        res.status(400).json(response);
        return;
    }

    // Generic server error carries the exception text
    const response: ErrorResponse = { detail: err.message };
    res.status(500).json(response);
}

/**
 * Answers unmatched routes with 404 and the endpoint catalog.
 */
export function notFoundHandler(endpoints: Record<string, readonly string[]>) {
    return (req: Request, res: Response): void => {
        console.warn(`[API] No route for ${req.method} ${req.path}`);
        res.status(404).json({
            detail: `Endpoint not found: ${req.method} ${req.path}`,
            available_endpoints: endpoints,
        });
    };
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
