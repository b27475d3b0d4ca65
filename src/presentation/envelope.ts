/**
 * Uniform success response wrapper.
 */
export interface SuccessEnvelope<T> {
    success: true;
    data: T;
    message: string;
    timestamp: string;
}

export function envelope<T>(data: T, message: string): SuccessEnvelope<T> {
    return {
        success: true,
        data,
        message,
        timestamp: new Date().toISOString(),
    };
}
