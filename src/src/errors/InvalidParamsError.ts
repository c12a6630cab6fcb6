/** Request parameters that do not match the method's schema. Reported as `-32602`. */
export class InvalidParamsError extends Error {
    constructor(message: string) {
        super(message);

        this.name = 'InvalidParamsError';
    }
}
