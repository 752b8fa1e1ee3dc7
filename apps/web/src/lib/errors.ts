/** Failure kinds of the generate pipeline and the HTTP status each maps to. */

export type ApiErrorKind =
    | 'MalformedPayload'
    | 'ValidationFailed'
    | 'RateLimited'
    | 'RenderFailed'
    | 'MethodNotAllowed';

export interface ApiError {
    kind: ApiErrorKind;
    message: string;
}

export const ERROR_STATUS: Record<ApiErrorKind, number> = {
    MalformedPayload: 400,
    ValidationFailed: 400,
    RenderFailed: 400,
    RateLimited: 429,
    MethodNotAllowed: 405,
};

export function malformedPayload(detail: string): ApiError {
    return { kind: 'MalformedPayload', message: `invalid JSON payload: ${detail}` };
}

export function validationFailed(message: string): ApiError {
    return { kind: 'ValidationFailed', message };
}
