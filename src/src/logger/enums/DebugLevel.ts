export enum DebugLevel {
    NONE = 0,
    ERROR = 1,
    WARN = 2,
    INFO = 3,
    DEBUG = 4,
    TRACE = 5,
    ALL = 6,
}

export function toDebugLevel(value: number): DebugLevel | undefined {
    switch (value) {
        case DebugLevel.NONE:
            return DebugLevel.NONE;
        case DebugLevel.ERROR:
            return DebugLevel.ERROR;
        case DebugLevel.WARN:
            return DebugLevel.WARN;
        case DebugLevel.INFO:
            return DebugLevel.INFO;
        case DebugLevel.DEBUG:
            return DebugLevel.DEBUG;
        case DebugLevel.TRACE:
            return DebugLevel.TRACE;
        case DebugLevel.ALL:
            return DebugLevel.ALL;
        default:
            return undefined;
    }
}
