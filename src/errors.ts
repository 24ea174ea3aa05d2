export type QueueErrorCode =
    | 'INVALID_ARGUMENT'
    | 'QUEUE_CLOSED'
    | 'QUEUE_EMPTY'
    | 'QUEUE_CANCELLED'
    | 'QUEUE_TIMEOUT';

export class QueueError extends Error {
    readonly code: QueueErrorCode;

    constructor(code: QueueErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

export class InvalidArgumentError extends QueueError {
    constructor(message: string) {
        super('INVALID_ARGUMENT', message);
    }
}

export class QueueClosedError extends QueueError {
    constructor(message: string = "Queue is closed") {
        super('QUEUE_CLOSED', message);
    }
}

export class QueueEmptyError extends QueueError {
    constructor(message: string = "Queue is empty") {
        super('QUEUE_EMPTY', message);
    }
}

export class QueueCancelledError extends QueueError {
    constructor(message: string = "Queue was cleared") {
        super('QUEUE_CANCELLED', message);
    }
}

export class QueueTimeoutError extends QueueError {
    readonly timeoutMs: number;

    constructor(timeoutMs: number, operation: string = "Operation") {
        super('QUEUE_TIMEOUT', `${operation} timed out after ${timeoutMs}ms`);
        this.timeoutMs = timeoutMs;
    }
}

export function isQueueError(error: unknown): error is QueueError {
    return error instanceof QueueError;
}

/** True for errors that mean "aborted by clear() or close()", as opposed to a timeout. */
export function isAbortError(error: unknown): error is QueueCancelledError | QueueClosedError {
    return error instanceof QueueCancelledError || error instanceof QueueClosedError;
}
