import { LOGGING_DEFAULTS, type LogLevel, type Logger } from '@waypoint/core';
import pino, { type DestinationStream, type Logger as PinoInstance } from 'pino';

export interface PinoLoggerOptions {
    level?: LogLevel;
    prettyPrint?: boolean;
    name?: string;
    /** Fields bound to every entry, e.g. `{ backend: 'postgres' }`. */
    bindings?: Record<string, unknown>;
    /** Write target; stdout when omitted. Ignored when `prettyPrint` is set. */
    destination?: DestinationStream;
}

export class PinoLogger implements Logger {
    private readonly pino: PinoInstance;

    constructor(options: PinoLoggerOptions | PinoInstance = {}) {
        this.pino = isPinoInstance(options) ? options : createPino(options);
    }

    public trace(obj: Record<string, unknown>, msg?: string): void;
    public trace(msg: string): void;
    public trace(arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino.trace(arg1);
        } else {
            this.pino.trace(arg1, arg2);
        }
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino.debug(arg1);
        } else {
            this.pino.debug(arg1, arg2);
        }
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino.info(arg1);
        } else {
            this.pino.info(arg1, arg2);
        }
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino.warn(arg1);
        } else {
            this.pino.warn(arg1, arg2);
        }
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino.error(arg1);
        } else {
            this.pino.error(arg1, arg2);
        }
    }

    public fatal(obj: Record<string, unknown>, msg?: string): void;
    public fatal(msg: string): void;
    public fatal(arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino.fatal(arg1);
        } else {
            this.pino.fatal(arg1, arg2);
        }
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new PinoLogger(this.pino.child(bindings));
    }
}

function isPinoInstance(value: PinoLoggerOptions | PinoInstance): value is PinoInstance {
    return 'child' in value;
}

function createPino(options: PinoLoggerOptions): PinoInstance {
    const {
        level = LOGGING_DEFAULTS.LEVEL,
        prettyPrint = false,
        name,
        bindings,
        destination
    } = options;

    const pinoOptions: pino.LoggerOptions = {
        level,
        serializers: { err: pino.stdSerializers.err }
    };

    if (name) {
        pinoOptions.name = name;
    }

    if (bindings) {
        pinoOptions.base = { ...bindings };
    }

    if (prettyPrint) {
        pinoOptions.transport = {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        };
        return pino(pinoOptions);
    }

    return destination ? pino(pinoOptions, destination) : pino(pinoOptions);
}
