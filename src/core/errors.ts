export type TimelineErrorCode =
    | 'ERR_INVALID_RESOLUTION'
    | 'ERR_INVALID_TEMPO'
    | 'ERR_INVALID_TIME_SIGNATURE'
    | 'ERR_INVALID_TICK'
    | 'ERR_ENTRY_OWNED'
    | 'ERR_UNKNOWN_KIND'
    | 'ERR_MISSING_ANCHOR'
    | 'ERR_UNKNOWN_INSTRUMENT'
    | 'ERR_UNKNOWN_DIFFICULTY'
    | 'ERR_BATCH_CLOSED';

export class TimelineError extends Error {
    public readonly code: TimelineErrorCode;

    constructor(code: TimelineErrorCode, message: string) {
        super(message);
        this.name = 'TimelineError';
        this.code = code;
    }
}

export function isTimelineError(value: unknown, code?: TimelineErrorCode): value is TimelineError {
    if (!(value instanceof TimelineError)) return false;
    return code === undefined || value.code === code;
}
