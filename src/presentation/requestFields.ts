import { BadRequestError } from './middleware/errorHandler';

type Body = Record<string, unknown>;

function asBody(body: unknown): Body {
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        throw new BadRequestError('Request body must be a JSON object');
    }
    return Object.fromEntries(Object.entries(body));
}

export function requireString(body: unknown, field: string): string {
    const value = asBody(body)[field];
    if (typeof value !== 'string' || !value.trim()) {
        throw new BadRequestError(`${field} is required and must be a string`);
    }
    return value;
}

export function optionalString(body: unknown, field: string): string | undefined {
    const value = asBody(body)[field];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'string') {
        throw new BadRequestError(`${field} must be a string`);
    }
    return value;
}

export function optionalBoolean(body: unknown, field: string): boolean | undefined {
    const value = asBody(body)[field];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'boolean') {
        throw new BadRequestError(`${field} must be a boolean`);
    }
    return value;
}

export function optionalStringArray(body: unknown, field: string): string[] | undefined {
    const value = asBody(body)[field];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
        throw new BadRequestError(`${field} must be an array of strings`);
    }
    return value;
}

export function requireStringArray(body: unknown, field: string): string[] {
    const value = optionalStringArray(body, field);
    if (value === undefined) {
        throw new BadRequestError(`${field} is required and must be an array of strings`);
    }
    return value;
}
