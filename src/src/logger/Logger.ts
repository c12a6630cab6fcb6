import { Chalk } from 'chalk';
import supportsColor from 'supports-color';
import { DebugLevel } from './enums/DebugLevel.js';
import type { ILogger } from './interfaces/ILogger.js';
import { RequestScope } from './RequestScope.js';

const chalk = new Chalk({ level: supportsColor.stdout ? supportsColor.stdout.level : 0 });

let lightenColor = function (color: string, percent: number) {
    color = color.replace('#', '');
    let num = parseInt(color, 16),
        amt = Math.round(2.55 * percent),
        R = (num >> 16) + amt,
        B = ((num >> 8) & 0x00ff) + amt,
        G = (num & 0x0000ff) + amt;
    return (
        0x1000000 +
        (R < 255 ? (R < 1 ? 0 : R) : 255) * 0x10000 +
        (B < 255 ? (B < 1 ? 0 : B) : 255) * 0x100 +
        (G < 255 ? (G < 1 ? 0 : G) : 255)
    )
        .toString(16)
        .slice(1);
};

export class Logger implements ILogger {
    private static debugLevel: DebugLevel = DebugLevel.INFO;

    public readonly moduleName: string = '';
    public readonly logColor: string = '#00bfff';
    protected enableLogs: boolean = true;
    protected hideLogs: boolean = false;
    private readonly pink: string = '#ff00ff';
    private readonly lightPink: string = lightenColor(this.pink, 75);
    private readonly purple: string = '#9400d3';
    private readonly lightPurple: string = lightenColor(this.purple, 15);
    private readonly green: string = '#7cfc00';
    private readonly lightGreen: string = lightenColor(this.green, 15);
    private readonly moca: string = '#ffdead';
    private readonly lightMoca: string = lightenColor(this.moca, 15);
    private readonly orange: string = '#ff8c00';
    private readonly lightOrange: string = lightenColor(this.orange, 15);
    private readonly red: string = '#ff4500';
    private readonly lightRed: string = lightenColor(this.red, 15);
    private readonly white: string = '#ffffff';
    private readonly darkred: string = '#8b0000';
    private readonly lightdarkred: string = lightenColor(this.darkred, 15);

    constructor() {
        this.moduleName = this.constructor.name;
    }

    public static setDebugLevel(level: DebugLevel): void {
        Logger.debugLevel = level;
    }

    public static getDebugLevel(): DebugLevel {
        return Logger.debugLevel;
    }

    /** Prefixes every line written while a request is being served with its correlation id. */
    public getStartPrefix(): string {
        const scope = RequestScope.current();
        if (!scope) {
            return '';
        }

        return `[${scope.requestId}] `;
    }

    public log(...args: unknown[]): void {
        if (!this.shouldLog(DebugLevel.INFO)) return;

        if (!this.hideLogs) {
            let light = lightenColor(this.logColor, 15);
            console.log(
                chalk.hex(this.logColor)(`${this.getStartPrefix()}[${this.moduleName} LOG]: `) +
                    chalk.hex(light)(...args),
            );
        }
    }

    public error(...args: unknown[]): void {
        if (!this.shouldLog(DebugLevel.ERROR)) return;

        console.log(
            chalk.hex(this.red)(`${this.getStartPrefix()}[${this.moduleName} ERROR]: `) +
                chalk.hex(this.lightRed)(...args),
        );
    }

    public warn(...args: unknown[]): void {
        if (!this.shouldLog(DebugLevel.WARN)) return;

        console.log(
            chalk.hex(this.orange)(`${this.getStartPrefix()}[${this.moduleName} WARN]: `) +
                chalk.hex(this.lightOrange)(...args),
        );
    }

    public debug(...args: unknown[]): void {
        if (!this.shouldLog(DebugLevel.DEBUG)) return;

        if (!this.hideLogs) {
            console.log(
                chalk.hex(this.moca)(`${this.getStartPrefix()}[${this.moduleName} DEBUG]: `) +
                    chalk.hex(this.lightMoca)(...args),
            );
        }
    }

    public success(...args: unknown[]): void {
        if (!this.shouldLog(DebugLevel.INFO)) return;

        if (!this.hideLogs) {
            console.log(
                chalk.hex(this.green)(`${this.getStartPrefix()}[${this.moduleName} SUCCESS]: `) +
                    chalk.hex(this.lightGreen)(...args),
            );
        }
    }

    public fail(...args: unknown[]): void {
        if (!this.shouldLog(DebugLevel.ERROR)) return;

        if (!this.hideLogs) {
            console.log(
                chalk.hex(this.red)(`${this.getStartPrefix()}[${this.moduleName} FAIL]: `) +
                    chalk.hex(this.lightRed)(...args),
            );
        }
    }

    public debugBright(...args: unknown[]): void {
        if (!this.shouldLog(DebugLevel.TRACE)) return;

        if (!this.hideLogs) {
            console.log(
                chalk.hex(this.purple)(`${this.getStartPrefix()}[${this.moduleName} DEBUG]: `) +
                    chalk.hex(this.lightPurple)(...args),
            );
        }
    }

    public important(...args: unknown[]): void {
        if (!this.shouldLog(DebugLevel.INFO)) return;

        console.log(
            chalk.hex(this.pink)(`${this.getStartPrefix()}[${this.moduleName} IMPORTANT]: `) +
                chalk.hex(this.lightPink)(...args),
        );
    }

    public panic(...args: unknown[]): void {
        if (!this.shouldLog(DebugLevel.ERROR)) return;

        console.log(
            chalk.hex(this.darkred)(`${this.getStartPrefix()}[${this.moduleName} HELP PANIC]: `) +
                chalk.hex(this.lightdarkred)(...args),
        );
    }

    public info(...args: unknown[]): void {
        if (!this.shouldLog(DebugLevel.INFO)) return;

        console.log(
            chalk.hex(this.pink)(`${this.getStartPrefix()}[${this.moduleName} INFO]: `) +
                chalk.hex(this.white)(...args),
        );
    }

    private shouldLog(level: DebugLevel): boolean {
        return this.enableLogs && Logger.debugLevel >= level;
    }
}
